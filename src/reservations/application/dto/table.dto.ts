import { z } from 'zod';

export const TableInputSchema = z
  .object({
    tableNumber: z.string().trim().min(1).max(10),
    minCapacity: z.number().int().positive(),
    maxCapacity: z.number().int().positive(),
    isShared: z.boolean().default(false),
    location: z
      .string()
      .max(50)
      .nullish()
      .transform((value) => value ?? null),
  })
  .refine((table) => table.maxCapacity >= table.minCapacity, {
    message: 'maxCapacity must be greater than or equal to minCapacity',
    path: ['maxCapacity'],
  });

export type TableInput = z.infer<typeof TableInputSchema>;

export const ListTablesQuerySchema = z.object({
  minCapacity: z.coerce.number().int().positive().optional(),
  maxCapacity: z.coerce.number().int().positive().optional(),
  isShared: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
  location: z.string().min(1).optional(),
});

export type ListTablesQuery = z.infer<typeof ListTablesQuerySchema>;

export interface TableResponse {
  id: string;
  tableNumber: string;
  minCapacity: number;
  maxCapacity: number;
  isShared: boolean;
  location: string | null;
  createdAt: string; // ISO 8601
  updatedAt: string; // ISO 8601
}

export interface ChairResponse {
  id: string;
  position: number;
  isAssigned: boolean;
}

export interface TableDetailsResponse extends TableResponse {
  chairs: ChairResponse[];
}
