import { asFunction } from 'awilix'
import type { AppContainer, AppCradle } from '@greenthumb/shared/lib/di/container'
import { PlantService } from './services/PlantService'

declare module '@greenthumb/shared/lib/di/container' {
  interface AppCradle {
    plantService: PlantService
  }
}

export function register(container: AppContainer) {
  container.register({
    plantService: asFunction(({ em }: AppCradle) => new PlantService(em)).scoped(),
  })
}
