/**
 * Recipe Schemas
 *
 * Zod validation schemas for remote catalog rows and the persisted local state.
 */

import { z } from 'zod';
import { CRAFTING_GRID_CELLS } from './recipes.types';

const recipeIdSchema = z.number().int();

/** Grid cells as stored remotely; null cells become '' */
const gridCellsSchema = z
  .array(z.string().nullable())
  .max(CRAFTING_GRID_CELLS)
  .transform((cells) => cells.map((cell) => cell ?? ''));

const optionalTextSchema = z
  .string()
  .nullable()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

/**
 * Row shape of the `recipes` table (snake_case, nullable columns)
 */
export const recipeRowSchema = z.object({
  id: recipeIdSchema,
  name: z.string().trim().min(1),
  image: z.string(),
  ingredients: gridCellsSchema,
  output: z.number().int().positive(),
  category: z
    .string()
    .nullable()
    .transform((value) => (value ?? '').trim()),
  remarks: optionalTextSchema,
  image_remark: optionalTextSchema,
  alternate_ingredients: gridCellsSchema.nullable().optional(),
  alternate_ingredients_1: gridCellsSchema.nullable().optional(),
  alternate_ingredients_2: gridCellsSchema.nullable().optional(),
  alternate_ingredients_3: gridCellsSchema.nullable().optional(),
  alternate_output: z.number().int().positive().nullable().optional(),
  alternate_output_1: z.number().int().positive().nullable().optional(),
  alternate_output_2: z.number().int().positive().nullable().optional(),
  alternate_output_3: z.number().int().positive().nullable().optional(),
});

export type RecipeRow = z.infer<typeof recipeRowSchema>;

/** Columns selected from `recipes` */
export const RECIPE_ROW_COLUMNS = [
  'id',
  'name',
  'image',
  'ingredients',
  'output',
  'category',
  'remarks',
  'image_remark',
  'alternate_ingredients',
  'alternate_ingredients_1',
  'alternate_ingredients_2',
  'alternate_ingredients_3',
  'alternate_output',
  'alternate_output_1',
  'alternate_output_2',
  'alternate_output_3',
].join(',');

export const favoriteRowSchema = z.object({
  recipe_id: recipeIdSchema,
});

/**
 * Recipe as persisted locally (same shape as the domain type)
 */
export const recipeSchema = z.object({
  id: recipeIdSchema,
  name: z.string().min(1),
  image: z.string(),
  ingredients: z.array(z.string()).max(CRAFTING_GRID_CELLS),
  output: z.number().int().positive(),
  category: z.string(),
  alternates: z.array(
    z.object({
      ingredients: z.array(z.string()).max(CRAFTING_GRID_CELLS),
      output: z.number().int().positive(),
    }),
  ),
  remarks: z.string().nullable(),
  imageRemark: z.string().nullable(),
});

export const pendingFavoriteChangeSchema = z.object({
  recipeId: recipeIdSchema,
  isFavorite: z.boolean(),
});

export const PERSISTED_STATE_VERSION = 1;

/**
 * Local state document (recipe-state.json)
 */
export const persistedRecipeStateSchema = z.object({
  version: z.literal(PERSISTED_STATE_VERSION),
  savedAt: z.string(),
  lastSyncedAt: z.string().nullable(),
  recipes: z.array(recipeSchema),
  favorites: z.array(recipeIdSchema),
  pendingChanges: z.array(pendingFavoriteChangeSchema),
  recentSearches: z.array(z.string()),
});

export type PersistedRecipeState = z.infer<typeof persistedRecipeStateSchema>;
