import {RegionCodeSchema, type RegionCode, type RegionProfile} from '@edge-router/schemas';

const defineRegion = (code: RegionCode, name: string, isEu = false): RegionProfile => ({
  code,
  name,
  namespace_id: `${code.toUpperCase()}_PROCESSOR`,
  location_hint: code,
  is_eu: isEu
});

export const REGION_PROFILES: Readonly<Record<RegionCode, RegionProfile>> = Object.freeze({
  wnam: defineRegion('wnam', 'Western North America'),
  enam: defineRegion('enam', 'Eastern North America'),
  weur: defineRegion('weur', 'Western Europe', true),
  eeur: defineRegion('eeur', 'Eastern Europe', true),
  apac: defineRegion('apac', 'Asia Pacific'),
  oc: defineRegion('oc', 'Oceania'),
  af: defineRegion('af', 'Africa'),
  me: defineRegion('me', 'Middle East')
});

export const ALL_REGION_CODES: readonly RegionCode[] = RegionCodeSchema.options;

export const getRegionProfile = (region: RegionCode): RegionProfile => REGION_PROFILES[region];

/**
 * Returns the region for a header value, or `null` when the value names no known region.
 */
export const parseRegionCode = (value: string): RegionCode | null => {
  const parsed = RegionCodeSchema.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : null;
};
