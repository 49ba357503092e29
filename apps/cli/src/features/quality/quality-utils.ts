import type { LowQualityAddress, QualityMeasures } from '@tagstore/maintenance';

function formatNumber(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(4);
}

export function formatQualityMeasures(measures: QualityMeasures, currency?: string): string {
  const scope = currency ? currency.toUpperCase() : 'all currencies';
  return [
    `Scope:   ${scope}`,
    `Count:   ${measures.count}`,
    `Average: ${formatNumber(measures.avg)}`,
    `Stddev:  ${formatNumber(measures.stddev)}`,
  ].join('\n');
}

/**
 * One line per address, labels deduplicated and sorted.
 */
export function formatLowQualityAddresses(addresses: readonly LowQualityAddress[]): string[] {
  return addresses.map(({ address, currency, labels }) => {
    const distinct = [...new Set(labels)].sort();
    return `${currency} ${address}: ${distinct.join(', ')}`;
  });
}
