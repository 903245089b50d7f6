import type { RealReturnOutcome } from '@/types';

const brl = new Intl.NumberFormat('pt-BR', { style: 'currency', currency: 'BRL' });

const pct = new Intl.NumberFormat('pt-BR', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  signDisplay: 'exceptZero',
});

export function formatBRL(value: number): string {
  return brl.format(value);
}

/** 12.3456 -> "+12,35%" */
export function formatPct(value: number): string {
  return `${pct.format(value)}%`;
}

/** "2024-03-15" -> "15/03/2024" */
export function formatDateBR(date: string): string {
  const [y, m, d] = date.split('-');
  return `${d}/${m}/${y}`;
}

export const OUTCOME_LABELS: Record<RealReturnOutcome, string> = {
  REAL_GAIN: 'Ganho real',
  REAL_LOSS: 'Perda real',
  BREAK_EVEN: 'Empate com a inflação',
};

const ERROR_MESSAGES: Record<string, string> = {
  INVALID_REQUEST: 'Verifique o ticker, as datas e o valor informados.',
  INVALID_WINDOW: 'A data inicial deve ser anterior ou igual à data final.',
  INVALID_AMOUNT: 'O valor investido deve ser maior que zero.',
  EMPTY_RANGE: 'Não há dados no período escolhido.',
  INSUFFICIENT_LEAD_DATA: 'Não há dados do IPCA para o início do período escolhido.',
  DATA_UNAVAILABLE: 'Não foi possível obter os dados. Verifique o código do ativo ou tente mais tarde.',
  RATE_LIMITED: 'Muitas requisições. Aguarde um instante.',
  SERVER_BUSY: 'Servidor ocupado. Tente novamente em instantes.',
};

/**
 * User-facing message for an API error code
 */
export function describeErrorCode(code: string): string {
  return ERROR_MESSAGES[code] ?? 'Erro inesperado. Tente novamente.';
}
