import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import type { RealReturnResponse } from '@/types';
import { computeRealReturn } from '@/lib/real-return';
import { projectInvestment } from '@/lib/result';
import { fetchPriceHistory } from '@/lib/yahoo';
import { fetchIpcaIndex } from '@/lib/bcb';
import { parseRealReturnQuery } from '@/lib/schemas';
import { badRequest, errorResponse } from '@/lib/api-errors';
import { withThrottle, ThrottlePresets } from '@/lib/rate-limit';
import logger from '@/lib/logger';

export const dynamic = 'force-dynamic';

async function handler(request: NextRequest): Promise<Response> {
  const query = parseRealReturnQuery(request.nextUrl.searchParams);
  if (!query.success) {
    return badRequest(query.error);
  }
  const { ticker, start, end, amount } = query.data;

  try {
    // Providers are independent; the calculation itself only starts once both are in memory
    const [priceHistory, inflation] = await Promise.all([
      fetchPriceHistory(ticker, start, end),
      fetchIpcaIndex(start, end),
    ]);

    const result = computeRealReturn(priceHistory.points, inflation, start, end);
    const projection = projectInvestment(result, amount);

    if (result.warnings.length > 0) {
      logger.warn(
        { symbol: priceHistory.symbol, start, end, warnings: result.warnings.length },
        'Dropped malformed points while normalizing'
      );
    }
    logger.info(
      { symbol: priceHistory.symbol, start, end, totalRealPct: result.totalRealPct, outcome: result.outcome },
      'Real return computed'
    );

    const body: RealReturnResponse = {
      ticker: priceHistory.symbol,
      result,
      projection,
    };
    return NextResponse.json(body);
  } catch (error) {
    return errorResponse(error, { ticker, start, end });
  }
}

// Adaptive throttling: hits both providers on a cold cache
export const GET = withThrottle(handler, {
  name: 'real-return',
  ...ThrottlePresets.expensive,
});
