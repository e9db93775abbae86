import 'reflect-metadata'
import { serve } from '@hono/node-server'
import type { Hono } from 'hono'
import { createCrudApp, lifespan, registerModule } from '@greenthumb/shared'
import { entities as plantEntities, register as registerPlants, createPlantsRouter } from './modules/plants'

export const entities = [...plantEntities]

export function resolvePort(raw = process.env.PORT): number {
  const port = Number.parseInt(raw ?? '', 10)
  return Number.isFinite(port) && port > 0 ? port : 8000
}

export function createApp(): Hono {
  registerModule(registerPlants)
  return createCrudApp([createPlantsRouter()])
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const stop = (signal: NodeJS.Signals) => resolve(signal)
    process.once('SIGINT', stop)
    process.once('SIGTERM', stop)
  })
}

export async function main(): Promise<void> {
  await lifespan({ entities }, async () => {
    const app = createApp()
    const port = resolvePort()
    const server = serve({ fetch: app.fetch, port }, (info) => {
      console.log(`[greenthumb] listening on http://localhost:${info.port}`)
    })
    const signal = await waitForSignal()
    console.log(`[greenthumb] ${signal} received, closing server`)
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
  })
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('[greenthumb] fatal', err)
    process.exit(1)
  })
}
