/**
 * Tests for spot price analysis and zone selection
 */
import {
  analyzeSpotPricing,
  calculateBidPrice,
  calculateSpotSavings,
  formatQuotes,
  getOptimalSpotConfiguration,
  rankQuotes,
  suggestAlternativeInstanceTypes,
} from '../src/spot/spot-pricing';
import {
  MissingParameterError,
  NoPricingDataError,
  PriceExceedsLimitError,
  ProviderApiError,
} from '../src/utils/errors';
import { FakeComputeProvider } from './helpers/fakes';

const REGION = 'us-east-1';

let provider: FakeComputeProvider;

beforeEach(() => {
  provider = new FakeComputeProvider();
  provider.prices['g4dn.xlarge'] = { 'us-east-1a': 0.15, 'us-east-1b': 0.09, 'us-east-1c': 0.2 };
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('analyzeSpotPricing', () => {
  test('picks the cheapest zone', async () => {
    const analysis = await analyzeSpotPricing(provider, 'g4dn.xlarge', REGION);

    expect(analysis.availabilityZone).toBe('us-east-1b');
    expect(analysis.price).toBe(0.09);
    expect(analysis.quotes.map((q) => q.availabilityZone)).toEqual(['us-east-1b', 'us-east-1a', 'us-east-1c']);
  });

  test('breaks exact ties by zone name', async () => {
    provider.prices['g4dn.xlarge'] = { 'us-east-1c': 0.1, 'us-east-1a': 0.1, 'us-east-1b': 0.12 };
    const analysis = await analyzeSpotPricing(provider, 'g4dn.xlarge', REGION);
    expect(analysis.availabilityZone).toBe('us-east-1a');
  });

  test('only queries the candidate zones when given', async () => {
    const analysis = await analyzeSpotPricing(provider, 'g4dn.xlarge', REGION, ['us-east-1a', 'us-east-1c']);

    expect(analysis.availabilityZone).toBe('us-east-1a');
    expect(provider.calls).not.toContain('listAvailabilityZones');
  });

  test('drops zones without data', async () => {
    provider.prices['g4dn.xlarge'] = { 'us-east-1c': 0.2 };
    const analysis = await analyzeSpotPricing(provider, 'g4dn.xlarge', REGION);
    expect(analysis.quotes).toHaveLength(1);
    expect(analysis.availabilityZone).toBe('us-east-1c');
  });

  test('skips a zone whose price lookup fails', async () => {
    provider.priceErrors['us-east-1c'] = new ProviderApiError('DescribeSpotPriceHistory', 'throttled');

    const analysis = await analyzeSpotPricing(provider, 'g4dn.xlarge', REGION);

    expect(analysis.availabilityZone).toBe('us-east-1b');
    expect(analysis.quotes.map((q) => q.availabilityZone)).toEqual(['us-east-1b', 'us-east-1a']);
    expect(console.log).toHaveBeenCalledWith(
      '[!] No spot price for g4dn.xlarge in us-east-1c: DescribeSpotPriceHistory failed: throttled'
    );
  });

  test('throws NoPricingDataError when every zone lookup fails', async () => {
    for (const zone of provider.zones) {
      provider.priceErrors[zone] = new ProviderApiError('DescribeSpotPriceHistory', 'throttled');
    }
    await expect(analyzeSpotPricing(provider, 'g4dn.xlarge', REGION)).rejects.toBeInstanceOf(NoPricingDataError);
  });

  test('throws NoPricingDataError when no zone has a price', async () => {
    provider.prices = {};
    await expect(analyzeSpotPricing(provider, 'g4dn.xlarge', REGION)).rejects.toBeInstanceOf(NoPricingDataError);
  });

  test('requires an instance type', async () => {
    await expect(analyzeSpotPricing(provider, '', REGION)).rejects.toBeInstanceOf(MissingParameterError);
    expect(provider.calls).toEqual([]);
  });
});

describe('getOptimalSpotConfiguration', () => {
  test('plans the cheapest zone with a bid 10% above the price', async () => {
    const plan = await getOptimalSpotConfiguration(provider, 'g4dn.xlarge', 0.5, REGION);

    expect(plan.availabilityZone).toBe('us-east-1b');
    expect(plan.currentPrice).toBe(0.09);
    expect(plan.bidPrice).toBe(0.099);
    expect(plan.maxPrice).toBe(0.5);
    expect(plan.rankedZones.map((q) => q.availabilityZone)).toEqual(['us-east-1b', 'us-east-1a', 'us-east-1c']);
  });

  test('ranked zones only include prices under the ceiling', async () => {
    const plan = await getOptimalSpotConfiguration(provider, 'g4dn.xlarge', 0.16, REGION);
    expect(plan.rankedZones.map((q) => q.availabilityZone)).toEqual(['us-east-1b', 'us-east-1a']);
    expect(plan.bidPrice).toBe(0.099);
  });

  test('throws PriceExceedsLimitError when the best price is over the ceiling', async () => {
    const promise = getOptimalSpotConfiguration(provider, 'g4dn.xlarge', 0.05, REGION);

    await expect(promise).rejects.toBeInstanceOf(PriceExceedsLimitError);
    await expect(promise).rejects.toMatchObject({ bestPrice: 0.09, maxPrice: 0.05, availabilityZone: 'us-east-1b' });
  });
});

describe('calculateBidPrice', () => {
  test('is capped at the ceiling', () => {
    expect(calculateBidPrice(0.48, 0.5)).toBe(0.5);
  });

  test('rounds to four decimals', () => {
    expect(calculateBidPrice(0.1234, 1)).toBe(0.1357);
  });
});

describe('rankQuotes', () => {
  test('does not modify its input', () => {
    const quotes = [
      { availabilityZone: 'b', pricePerHour: 2, timestamp: new Date(0) },
      { availabilityZone: 'a', pricePerHour: 1, timestamp: new Date(0) },
    ];
    const ranked = rankQuotes(quotes);
    expect(ranked.map((q) => q.availabilityZone)).toEqual(['a', 'b']);
    expect(quotes[0]?.availabilityZone).toBe('b');
  });
});

describe('suggestAlternativeInstanceTypes', () => {
  test('reports which alternatives fit the budget', async () => {
    provider.prices['g5.xlarge'] = { 'us-east-1a': 0.4 };
    provider.prices['c5.xlarge'] = { 'us-east-1b': 0.06 };
    provider.prices['m5.xlarge'] = { 'us-east-1c': 0.07 };

    const suggestions = await suggestAlternativeInstanceTypes(provider, 'g4dn.xlarge', 0.1, REGION);

    expect(suggestions).toEqual([
      { instanceType: 'g5.xlarge', withinBudget: false, availabilityZone: 'us-east-1a', price: 0.4 },
      { instanceType: 'g6.xlarge', withinBudget: false, error: 'No spot pricing data for g6.xlarge in us-east-1' },
      { instanceType: 'c5.xlarge', withinBudget: true, availabilityZone: 'us-east-1b', price: 0.06 },
      { instanceType: 'm5.xlarge', withinBudget: true, availabilityZone: 'us-east-1c', price: 0.07 },
    ]);
  });

  test('returns nothing for types without alternatives', async () => {
    expect(await suggestAlternativeInstanceTypes(provider, 't3.micro', 0.1, REGION)).toEqual([]);
  });
});

describe('calculateSpotSavings', () => {
  test('compares with the on-demand price over 24 hours', () => {
    expect(calculateSpotSavings(0.15, 'g4dn.xlarge')).toEqual({
      instanceType: 'g4dn.xlarge',
      hours: 24,
      spotCost: 3.6,
      ondemandCost: 12.624,
      savings: 9.024,
      savingsPercent: 71.5,
    });
  });

  test('returns null for unknown types', () => {
    expect(calculateSpotSavings(0.1, 'x9.huge')).toBeNull();
  });
});

describe('formatQuotes', () => {
  test('marks quotes over the ceiling', () => {
    const lines = formatQuotes(
      [
        { availabilityZone: 'us-east-1a', pricePerHour: 0.15, timestamp: new Date(0) },
        { availabilityZone: 'us-east-1b', pricePerHour: 0.09, timestamp: new Date(0) },
      ],
      0.1
    );
    expect(lines).toEqual(['   us-east-1b     $0.0900/hour', '   us-east-1a     $0.1500/hour  (over budget)']);
  });
});
