import { get, getOrConvert, getOrCreate, remove, update, type GetOptions } from '@greenthumb/shared/lib/db/crud'
import { ValidationError } from '@greenthumb/shared/lib/db/errors'
import { withCommit, type Session } from '@greenthumb/shared/lib/db/transactions'
import { Plant } from '../data/entities'
import type { PlantCreateInput, PlantUpdateInput } from '../data/validators'

export class PlantService {
  constructor(private readonly em: Session) {}

  async list(options: Omit<GetOptions, 'oneOrNone'> = {}): Promise<Plant[]> {
    return get(this.em, Plant, { ...options, oneOrNone: false })
  }

  async findByName(name: string): Promise<Plant | null> {
    return get(this.em, Plant, { filters: { name }, oneOrNone: true })
  }

  /**
   * Idempotent registration: a plant with the same name is returned as is,
   * otherwise one is created and committed.
   */
  async adopt(input: PlantCreateInput): Promise<Plant> {
    const plant = await withCommit(this.em, (session) =>
      getOrCreate(session, Plant, { name: input.name, species: input.species ?? null }, { name: input.name })
    )
    if (!plant) throw new ValidationError('Plant name is required')
    return plant
  }

  /** Like `adopt`, but nothing is written when the plant is new. */
  async preview(input: PlantCreateInput): Promise<Plant | null> {
    return getOrConvert(this.em, Plant, { name: input.name, species: input.species ?? null }, { name: input.name })
  }

  async rename(id: number, patch: PlantUpdateInput): Promise<Plant> {
    return withCommit(this.em, (session) => update(session, Plant, id, patch))
  }

  async discard(id: number): Promise<void> {
    await withCommit(this.em, (session) => remove(session, Plant, id))
  }
}
