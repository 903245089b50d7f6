import { NextResponse } from 'next/server';
import { getCircuitBreakerStatus } from '@/lib/resilience';
import { getLoadMetrics, withThrottle, ThrottlePresets } from '@/lib/rate-limit';

export const dynamic = 'force-dynamic';

function handler(): Response {
  return NextResponse.json({
    status: 'ok',
    circuits: getCircuitBreakerStatus(),
    load: getLoadMetrics(),
  });
}

export const GET = withThrottle(handler, {
  name: 'health',
  ...ThrottlePresets.light,
});
