import { makeCrudRouter } from '@greenthumb/shared/lib/crud/factory'
import type { AppContainer } from '@greenthumb/shared/lib/di/container'
import { Plant } from '../data/entities'
import { plantCreateSchema, plantReadSchema, plantUpdateSchema } from '../data/validators'

export function createPlantsRouter(container?: AppContainer) {
  return makeCrudRouter({
    entity: Plant,
    schemas: {
      create: plantCreateSchema,
      read: plantReadSchema,
      update: plantUpdateSchema,
    },
    prefix: '/plants',
    tags: ['plants'],
    container,
  })
}
