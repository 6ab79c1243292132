/**
 * Spot Price Analyzer
 *
 * Picks the availability zone with the cheapest current spot price for an
 * instance type and turns it into a launch plan (zone + bid). Quotes come
 * from the injected ComputeProvider so the selection logic is testable
 * without AWS.
 */

import type { SpotLaunchPlan, SpotPriceAnalysis, SpotPriceQuote } from '../types/index.js';
import type { ComputeProvider } from '../providers/interfaces/index.js';
import { ALTERNATIVE_INSTANCE_TYPES, ONDEMAND_HOURLY_PRICES } from '../constants/instance-types.js';
import {
  MissingParameterError,
  NoPricingDataError,
  PriceExceedsLimitError,
  ProviderApiError,
  errorMessage,
} from '../utils/errors.js';

/** Bid this much above the current price to ride out small fluctuations */
export const BID_MULTIPLIER = 1.1;

function roundPrice(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Cheapest first; equal prices ordered by zone name
 */
export function rankQuotes(quotes: SpotPriceQuote[]): SpotPriceQuote[] {
  return [...quotes].sort(
    (a, b) => a.pricePerHour - b.pricePerHour || a.availabilityZone.localeCompare(b.availabilityZone, 'en')
  );
}

/**
 * Bid = current price x 1.1, never above the ceiling
 */
export function calculateBidPrice(currentPrice: number, maxPrice: number, multiplier = BID_MULTIPLIER): number {
  return Math.min(roundPrice(currentPrice * multiplier), maxPrice);
}

// ============================================================
// ANALYSIS
// ============================================================

/**
 * Find the cheapest zone for an instance type.
 *
 * @param candidateAZs - Zones to consider; every zone in the region when omitted
 * @throws NoPricingDataError when no zone returns a price
 */
export async function analyzeSpotPricing(
  provider: ComputeProvider,
  instanceType: string,
  region: string,
  candidateAZs?: string[]
): Promise<SpotPriceAnalysis> {
  if (!instanceType || !region) {
    const missing = [!instanceType ? 'instanceType' : '', !region ? 'region' : ''].filter(Boolean);
    throw new MissingParameterError('analyzeSpotPricing', missing);
  }

  const zones =
    candidateAZs && candidateAZs.length > 0 ? candidateAZs : await provider.listAvailabilityZones(region);

  const quotes: SpotPriceQuote[] = [];
  for (const zone of zones) {
    try {
      const quote = await provider.getLatestSpotPrice(instanceType, zone, region);
      if (quote) {
        quotes.push(quote);
      }
    } catch (e) {
      // A zone whose lookup fails counts as a zone without data
      if (!(e instanceof ProviderApiError)) throw e;
      console.log(`[!] No spot price for ${instanceType} in ${zone}: ${errorMessage(e)}`);
    }
  }

  const ranked = rankQuotes(quotes);
  const best = ranked[0];
  if (!best) {
    throw new NoPricingDataError(instanceType, region);
  }

  return {
    availabilityZone: best.availabilityZone,
    price: best.pricePerHour,
    quotes: ranked,
  };
}

/**
 * Build the spot launch plan for an instance type under a price ceiling.
 *
 * @throws NoPricingDataError when no zone has pricing
 * @throws PriceExceedsLimitError when even the cheapest zone is above maxPrice
 */
export async function getOptimalSpotConfiguration(
  provider: ComputeProvider,
  instanceType: string,
  maxPrice: number,
  region: string,
  candidateAZs?: string[]
): Promise<SpotLaunchPlan> {
  const analysis = await analyzeSpotPricing(provider, instanceType, region, candidateAZs);

  if (analysis.price > maxPrice) {
    throw new PriceExceedsLimitError(analysis.price, maxPrice, analysis.availabilityZone);
  }

  return {
    instanceType,
    availabilityZone: analysis.availabilityZone,
    currentPrice: analysis.price,
    bidPrice: calculateBidPrice(analysis.price, maxPrice),
    maxPrice,
    rankedZones: analysis.quotes.filter((q) => q.pricePerHour <= maxPrice),
  };
}

// ============================================================
// ALTERNATIVES AND COST
// ============================================================

export interface AlternativeSuggestion {
  instanceType: string;
  withinBudget: boolean;
  availabilityZone?: string;
  price?: number;
  error?: string;
}

/**
 * Check the sibling types of an instance type against the same budget.
 * Types without pricing are reported, not thrown.
 */
export async function suggestAlternativeInstanceTypes(
  provider: ComputeProvider,
  instanceType: string,
  maxPrice: number,
  region: string
): Promise<AlternativeSuggestion[]> {
  const alternatives = ALTERNATIVE_INSTANCE_TYPES[instanceType] ?? [];
  if (alternatives.length === 0) {
    console.log(`[!] No alternatives defined for instance type: ${instanceType}`);
    return [];
  }

  const zones = await provider.listAvailabilityZones(region);
  const suggestions: AlternativeSuggestion[] = [];

  for (const alternative of alternatives) {
    try {
      const analysis = await analyzeSpotPricing(provider, alternative, region, zones);
      suggestions.push({
        instanceType: alternative,
        withinBudget: analysis.price <= maxPrice,
        availabilityZone: analysis.availabilityZone,
        price: analysis.price,
      });
    } catch (e) {
      suggestions.push({ instanceType: alternative, withinBudget: false, error: errorMessage(e) });
    }
  }

  return suggestions;
}

export function formatSuggestions(suggestions: AlternativeSuggestion[]): string[] {
  return suggestions.map((suggestion) => {
    if (suggestion.error) {
      return `   ${suggestion.instanceType.padEnd(14)} ${suggestion.error}`;
    }
    const marker = suggestion.withinBudget ? '[OK]' : '[!]';
    return `   ${marker} ${suggestion.instanceType.padEnd(14)} $${(suggestion.price ?? 0).toFixed(4)}/hour in ${suggestion.availabilityZone ?? ''}`;
  });
}

export interface SpotSavings {
  instanceType: string;
  hours: number;
  spotCost: number;
  ondemandCost: number;
  savings: number;
  savingsPercent: number;
}

/**
 * Compare a spot price with the on-demand list price.
 * Returns null for types missing from the on-demand table.
 */
export function calculateSpotSavings(spotPrice: number, instanceType: string, hours = 24): SpotSavings | null {
  const ondemandPrice = ONDEMAND_HOURLY_PRICES[instanceType];
  if (ondemandPrice === undefined) {
    return null;
  }

  const spotCost = roundPrice(spotPrice * hours);
  const ondemandCost = roundPrice(ondemandPrice * hours);
  const savings = roundPrice(ondemandCost - spotCost);

  return {
    instanceType,
    hours,
    spotCost,
    ondemandCost,
    savings,
    savingsPercent: Math.round((savings / ondemandCost) * 1000) / 10,
  };
}

/**
 * Printable price table, cheapest first
 */
export function formatQuotes(quotes: SpotPriceQuote[], maxPrice?: number): string[] {
  return rankQuotes(quotes).map((q) => {
    const marker = maxPrice !== undefined && q.pricePerHour > maxPrice ? '  (over budget)' : '';
    return `   ${q.availabilityZone.padEnd(14)} $${q.pricePerHour.toFixed(4)}/hour${marker}`;
  });
}
