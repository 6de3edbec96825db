export interface Region {
  code: string;
  slug: string;
  title: string;
}

// `code` matches the region column of the gage file; `slug` is the page path
export const REGIONS: Region[] = [
  { code: 'Ark', slug: 'arkansas', title: 'Arkansas Valley' },
  { code: 'FR', slug: 'front_range', title: 'Front Range' },
  { code: 'Durango', slug: 'durango', title: 'Durango' },
  { code: 'Multi', slug: 'multiday', title: 'Multi-day' },
  { code: 'Central', slug: 'central', title: 'Central' },
  { code: 'WV', slug: 'west_virginia', title: 'West Virginia' },
  { code: 'WY', slug: 'wyoming', title: 'Wyoming' },
];

export function findRegionBySlug(slug: string): Region | undefined {
  return REGIONS.find(region => region.slug === slug);
}
