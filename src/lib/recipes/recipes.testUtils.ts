/**
 * Shared test helpers for recipe fixtures.
 */

import type { Recipe } from './recipes.types';

export function makeRecipe(overrides: Partial<Recipe> & { id: number }): Recipe {
  return {
    name: `Recipe ${overrides.id}`,
    image: `recipe-${overrides.id}`,
    ingredients: ['Stick', '', '', '', '', '', '', '', ''],
    output: 1,
    category: '',
    alternates: [],
    remarks: null,
    imageRemark: null,
    ...overrides,
  };
}

export const torch = makeRecipe({
  id: 1,
  name: 'Torch',
  image: 'torch',
  ingredients: ['Coal', '', '', 'Stick', '', '', '', '', ''],
  output: 4,
  category: 'Tools',
});

export const chest = makeRecipe({
  id: 2,
  name: 'Chest',
  image: 'chest',
  ingredients: [
    'Planks',
    'Planks',
    'Planks',
    'Planks',
    '',
    'Planks',
    'Planks',
    'Planks',
    'Planks',
  ],
  output: 1,
  category: 'Storage',
});
