/**
 * Cost Configuration
 *
 * Places API pricing used for the per-run usage summary.
 * All costs are in USD.
 *
 * @module config/costs
 */

/**
 * API call costs (USD per call)
 */
export const API_COSTS = {
  places: {
    textSearch: 0.032, // $32 per 1000 calls
    placeDetails: 0.017, // $17 per 1000 calls
  },
} as const;

export type ApiProvider = keyof typeof API_COSTS;

/**
 * Calculate cost for API calls
 */
export function calculateApiCost<T extends ApiProvider>(
  provider: T,
  callType: keyof (typeof API_COSTS)[T] & string,
  callCount: number
): number {
  const costs: Record<string, number> = API_COSTS[provider];
  const costPerCall = costs[callType] ?? 0;
  return costPerCall * callCount;
}

/**
 * Places API usage for one run
 */
export interface PlacesUsage {
  textSearch: number;
  placeDetails: number;
}

/**
 * Estimated Places API cost of a run
 */
export function estimatePlacesCost(usage: PlacesUsage): number {
  return (
    calculateApiCost('places', 'textSearch', usage.textSearch) +
    calculateApiCost('places', 'placeDetails', usage.placeDetails)
  );
}

/**
 * Format cost for display (e.g., "$0.0450")
 */
export function formatCost(cost: number): string {
  if (cost < 0.01) {
    return `$${cost.toFixed(4)}`;
  }
  return `$${cost.toFixed(2)}`;
}
