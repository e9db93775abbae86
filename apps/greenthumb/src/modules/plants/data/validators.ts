import { z } from 'zod'

export const plantCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  species: z.string().trim().min(1).max(200).nullish(),
})

export const plantUpdateSchema = plantCreateSchema.partial()

export const plantReadSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  species: z.string().nullish(),
  createdAt: z.coerce.date(),
})

export type PlantCreateInput = z.infer<typeof plantCreateSchema>
export type PlantUpdateInput = z.infer<typeof plantUpdateSchema>
export type PlantRead = z.infer<typeof plantReadSchema>
