// Pure utility functions for the process command

import { formatAmount } from '@clearledger/core';
import type { ClientBalance } from '@clearledger/ledger';

import type { ProcessSummary } from './process-handler.js';

export const BALANCE_CSV_HEADER = 'client,available,held,total,locked';

/**
 * Render balances as CSV, one row per client sorted by client id.
 */
export function renderBalancesCsv(balances: readonly ClientBalance[]): string {
  const rows = [...balances]
    .sort((a, b) => a.clientId - b.clientId)
    .map((balance) =>
      [
        balance.clientId,
        formatAmount(balance.available),
        formatAmount(balance.held),
        formatAmount(balance.total),
        balance.locked,
      ].join(',')
    );

  return `${[BALANCE_CSV_HEADER, ...rows].join('\n')}\n`;
}

/**
 * One-line run summary, e.g. `Processed 5 records: 4 accepted, 1 rejected (INSUFFICIENT_FUNDS=1)`.
 */
export function formatProcessSummary(summary: ProcessSummary): string {
  const line = `Processed ${summary.records} records: ${summary.accepted} accepted, ${summary.rejected} rejected`;

  const codes = Object.entries(summary.rejectionsByCode)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([code, count]) => `${code}=${count}`);

  return codes.length > 0 ? `${line} (${codes.join(', ')})` : line;
}
