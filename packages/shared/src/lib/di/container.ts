import { asFunction, asValue, createContainer, InjectionMode, type AwilixContainer } from 'awilix'
import type { MikroORM } from '@mikro-orm/core'
import { getOrm, releaseSession } from '../db/orm'
import type { Session } from '../db/transactions'

// Modules add their services through declaration merging
export interface AppCradle {
  orm: MikroORM
  em: Session
}

export type AppContainer = AwilixContainer<AppCradle>

export type ModuleRegistrar = (container: AppContainer) => void

const moduleRegistrars: ModuleRegistrar[] = []
let current: AppContainer | null = null

/**
 * Application container: the ORM as a value and one forked `em` per scope.
 * Disposing a scope releases its session.
 */
export function createAppContainer(orm: MikroORM, registrars: readonly ModuleRegistrar[] = moduleRegistrars): AppContainer {
  const container = createContainer<AppCradle>({ injectionMode: InjectionMode.PROXY })
  container.register({
    orm: asValue(orm),
    em: asFunction(({ orm }: AppCradle) => orm.em.fork())
      .scoped()
      .disposer(releaseSession),
  })
  for (const register of registrars) register(container)
  return container
}

/** Modules call this once at import time; the next container picks them up. */
export function registerModule(registrar: ModuleRegistrar): void {
  if (moduleRegistrars.includes(registrar)) return
  moduleRegistrars.push(registrar)
  current = null
}

export async function getAppContainer(): Promise<AppContainer> {
  const orm = await getOrm()
  // rebuilt when the ORM was disposed and initialized again
  if (!current || current.cradle.orm !== orm) current = createAppContainer(orm)
  return current
}

export async function createRequestContainer(container?: AppContainer): Promise<AppContainer> {
  const root = container ?? (await getAppContainer())
  return root.createScope()
}
