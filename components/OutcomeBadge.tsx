'use client';

import type { RealReturnOutcome } from '@/types';
import { OUTCOME_LABELS } from '@/lib/format';

interface OutcomeBadgeProps {
  outcome: RealReturnOutcome;
}

const colorClasses: Record<RealReturnOutcome, string> = {
  REAL_GAIN: 'bg-green-100 text-green-800 dark:bg-green-900/40 dark:text-green-300',
  REAL_LOSS: 'bg-red-100 text-red-800 dark:bg-red-900/40 dark:text-red-300',
  BREAK_EVEN: 'bg-gray-100 text-gray-800 dark:bg-gray-800 dark:text-gray-300',
};

export function OutcomeBadge({ outcome }: OutcomeBadgeProps): React.ReactElement {
  return (
    <span
      className={`inline-flex items-center px-3 py-1 rounded-full text-sm font-medium ${colorClasses[outcome]}`}
    >
      {OUTCOME_LABELS[outcome]}
    </span>
  );
}
