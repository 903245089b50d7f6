import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import type { InflationResponse } from '@/types';
import { fetchIpcaIndex } from '@/lib/bcb';
import { parseInflationQuery } from '@/lib/schemas';
import { badRequest, errorResponse } from '@/lib/api-errors';
import { withThrottle, ThrottlePresets } from '@/lib/rate-limit';

export const dynamic = 'force-dynamic';

async function handler(request: NextRequest): Promise<Response> {
  const query = parseInflationQuery(request.nextUrl.searchParams);
  if (!query.success) {
    return badRequest(query.error);
  }
  const { start, end } = query.data;

  try {
    const body: InflationResponse = { points: await fetchIpcaIndex(start, end) };
    return NextResponse.json(body);
  } catch (error) {
    return errorResponse(error, { start, end });
  }
}

// Adaptive throttling: served from the IPCA cache once warm
export const GET = withThrottle(handler, {
  name: 'inflation',
  ...ThrottlePresets.standard,
});
