/**
 * Station eligibility
 * Decides from a station's available Frost time series whether it is worth harvesting.
 */

export const RADIATION_ELEMENTS = [
  'integral_of_surface_downwelling_shortwave_flux_in_air(PT1H)',
  'integral_of_direct_normal_irradiance(PT1H)',
  'integral_of_diffuse_horizontal_irradiance(PT1H)',
];

export const CORE_ELEMENTS = [
  ...RADIATION_ELEMENTS,
  'air_temperature',
  'surface_snow_thickness',
  'cloud_area_fraction',
];

export interface EligibilityRules {
  coreElements: readonly string[];
  radiationElements: readonly string[];
  minCoreMatches: number;
}

export const DEFAULT_ELIGIBILITY_RULES: EligibilityRules = {
  coreElements: CORE_ELEMENTS,
  radiationElements: RADIATION_ELEMENTS,
  minCoreMatches: 3,
};

export interface EligibilityResult {
  eligible: boolean;
  matchedCore: string[];        // sorted
  matchedRadiation: string[];   // sorted
  reasons: string[];
}

/**
 * Eligible with at least minCoreMatches core elements, or any radiation element
 */
export function evaluateEligibility(
  available: Iterable<string>,
  rules: EligibilityRules = DEFAULT_ELIGIBILITY_RULES
): EligibilityResult {
  const offered = new Set(available);
  const matchedCore = rules.coreElements.filter(e => offered.has(e)).sort();
  const matchedRadiation = rules.radiationElements.filter(e => offered.has(e)).sort();

  const reasons: string[] = [];
  if (matchedCore.length >= rules.minCoreMatches) {
    reasons.push(`At least ${rules.minCoreMatches} core elements`);
  }
  if (matchedRadiation.length > 0) {
    reasons.push('Has radiation data');
  }

  return {
    eligible: reasons.length > 0,
    matchedCore,
    matchedRadiation,
    reasons,
  };
}
