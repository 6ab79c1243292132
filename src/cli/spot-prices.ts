/**
 * Spot Prices Command
 *
 * Shows the current spot price per zone for an instance type and, with a
 * ceiling, the bid a deploy would use or the alternatives that fit.
 */

import type { SpotPricesOptions, SpotPricesResult } from '../types/index.js';
import {
  analyzeSpotPricing,
  calculateBidPrice,
  calculateSpotSavings,
  formatQuotes,
  formatSuggestions,
  suggestAlternativeInstanceTypes,
} from '../spot/spot-pricing.js';
import { getString } from '../utils/config-helpers.js';
import { errorMessage } from '../utils/errors.js';
import { parseNumberFlag, providersFor, resolveCommandConfig, type CommandContext } from './context.js';

export async function spotPrices(
  instanceType: string,
  options: SpotPricesOptions = {},
  context: CommandContext = {}
): Promise<SpotPricesResult> {
  try {
    const config = resolveCommandConfig(
      undefined,
      undefined,
      { 'aws.region': options.region, 'instance.type': instanceType },
      options,
      context,
      true
    );
    const region = getString(config, 'aws.region');
    const maxPrice = parseNumberFlag(options.maxPrice, '--max-price');
    const { compute } = providersFor(config, context);

    console.log(`\n💰 Spot prices for ${instanceType} in ${region}:`);
    const analysis = await analyzeSpotPricing(compute, instanceType, region, options.zones);
    for (const line of formatQuotes(analysis.quotes, maxPrice)) {
      console.log(line);
    }

    console.log(`\n[OK] Cheapest: ${analysis.availabilityZone} at $${analysis.price.toFixed(4)}/hour`);
    const savings = calculateSpotSavings(analysis.price, instanceType);
    if (savings) {
      console.log(
        `   ${savings.hours}h: $${savings.spotCost.toFixed(2)} spot vs $${savings.ondemandCost.toFixed(2)} on-demand (${savings.savingsPercent}% saved)`
      );
    }

    if (maxPrice === undefined) {
      return { success: true, analysis };
    }

    if (analysis.price <= maxPrice) {
      console.log(`   Bid at max $${maxPrice}: $${calculateBidPrice(analysis.price, maxPrice)}`);
      return { success: true, analysis };
    }

    console.log(`\n[!] Cheapest price is above the $${maxPrice}/hour limit. Alternatives:`);
    const suggestions = await suggestAlternativeInstanceTypes(compute, instanceType, maxPrice, region);
    for (const line of formatSuggestions(suggestions)) {
      console.log(line);
    }
    return { success: true, analysis };
  } catch (e) {
    const message = errorMessage(e);
    console.log(`\n[ERROR] ${message}`);
    return { success: false, error: message };
  }
}

export default spotPrices;
