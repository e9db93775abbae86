import { Plant } from './data/entities'
import { register } from './di'
import { createPlantsRouter } from './api/route'

export type ModuleInfo = {
  name: string
  title: string
  version: string
  description: string
}

export const metadata: ModuleInfo = {
  name: 'plants',
  title: 'Plants',
  version: '0.1.0',
  description: 'Plant collection: CRUD endpoints and idempotent registration by name.',
}

export const entities = [Plant]

export { register, createPlantsRouter }
