export type VirtualRecipe =
  | { kind: 'difference'; minuend: string; subtrahend: string }
  | { kind: 'inflow'; reservoir: string; downstream: string };

// Gages computed from two stored real gages, keyed by virtual gage id
export const virtualRecipes: Record<string, VirtualRecipe> = {
  // Foxton: South Platte at Waterton minus Deckers
  FOXTON: { kind: 'difference', minuend: 'PLASPLCO', subtrahend: '06701900' },
  // Wildcat: South Platte above Cheesman minus Tarryall Creek
  WILDCAT: { kind: 'difference', minuend: '06700000', subtrahend: 'TARTARCO' },
  // North St. Vrain above Button Rock: reservoir storage change plus release
  NSV: { kind: 'inflow', reservoir: 'BRKDAMCO', downstream: 'NSVBBRCO' },
};
