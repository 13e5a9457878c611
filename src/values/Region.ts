/**
 * Regions of the world as the API codes them
 *
 * Queries send the numeric code; records carry the display name.
 * Codes 6, 8 and 10 are not assigned.
 */

export enum Region {
  WesternAfrica = 1,
  MiddleAfrica = 2,
  EasternAfrica = 3,
  SouthernAfrica = 4,
  NorthernAfrica = 5,
  SouthAsia = 7,
  SoutheastAsia = 9,
  MiddleEast = 11,
  Europe = 12,
  CaucasusAndCentralAsia = 13,
  CentralAmerica = 14,
  SouthAmerica = 15,
  Caribbean = 16,
  EastAsia = 17,
  NorthAmerica = 18,
  Oceania = 19,
  Antarctica = 20,
}

const REGION_NAMES: Readonly<Record<Region, string>> = {
  [Region.WesternAfrica]: 'Western Africa',
  [Region.MiddleAfrica]: 'Middle Africa',
  [Region.EasternAfrica]: 'Eastern Africa',
  [Region.SouthernAfrica]: 'Southern Africa',
  [Region.NorthernAfrica]: 'Northern Africa',
  [Region.SouthAsia]: 'South Asia',
  [Region.SoutheastAsia]: 'Southeast Asia',
  [Region.MiddleEast]: 'Middle East',
  [Region.Europe]: 'Europe',
  [Region.CaucasusAndCentralAsia]: 'Caucasus and Central Asia',
  [Region.CentralAmerica]: 'Central America',
  [Region.SouthAmerica]: 'South America',
  [Region.Caribbean]: 'Caribbean',
  [Region.EastAsia]: 'East Asia',
  [Region.NorthAmerica]: 'North America',
  [Region.Oceania]: 'Oceania',
  [Region.Antarctica]: 'Antarctica',
};

const REGIONS_BY_NAME = new Map<string, Region>(
  Object.values(Region)
    .filter((value): value is Region => typeof value === 'number')
    .map((region) => [REGION_NAMES[region], region])
);

const REGIONS_BY_CODE = new Map<number, Region>(
  [...REGIONS_BY_NAME.values()].map((region) => [region, region])
);

/** Display name used in API records, e.g. 'Middle Africa' */
export function regionName(region: Region): string {
  return REGION_NAMES[region];
}

/**
 * Look up a region by its exact display name
 * @returns The region, or null for an unknown name
 */
export function parseRegion(name: string): Region | null {
  return REGIONS_BY_NAME.get(name) ?? null;
}

/** Look up a region by its numeric code */
export function regionFromCode(code: number): Region | null {
  return REGIONS_BY_CODE.get(code) ?? null;
}
