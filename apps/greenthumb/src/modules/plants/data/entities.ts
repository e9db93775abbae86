import 'reflect-metadata'
import { Entity, OptionalProps, PrimaryKey, Property } from '@mikro-orm/core'

/**
 * Plant - one specimen in the collection
 */
@Entity({ tableName: 'plants' })
export class Plant {
  [OptionalProps]?: 'createdAt'

  @PrimaryKey({ type: 'integer', autoincrement: true })
  id!: number

  @Property({ type: 'text' })
  name!: string

  @Property({ type: 'text', nullable: true })
  species?: string | null

  @Property({ type: 'datetime' })
  createdAt: Date = new Date()
}
