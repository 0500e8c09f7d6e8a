import Decimal from 'decimal.js';
import { BatchReport, CategorySummary, OrderResult } from './types';

export function aggregateResults(results: readonly OrderResult[]): BatchReport {
  let spent = new Decimal(0);
  let successCount = 0;
  let failedCount = 0;
  let rejectedCount = 0;

  for (const result of results) {
    switch (result.outcome) {
      case 'SUCCESS':
        successCount++;
        spent = spent.plus(result.notional);
        break;
      case 'FAILED':
        failedCount++;
        break;
      case 'REJECTED':
        rejectedCount++;
        break;
    }
  }

  return {
    results: Object.freeze([...results]),
    totalNotionalSpent: spent.toNumber(),
    successCount,
    failedCount,
    rejectedCount,
  };
}

function describeResult(result: OrderResult): string {
  const head = `${result.outcome} ${result.symbol} qty=${result.quantity} price=${result.price} notional=${result.notional}`;
  switch (result.outcome) {
    case 'SUCCESS':
      return `${head} | ${result.message}`;
    case 'REJECTED':
      return `${head} | ${result.reason} (${result.detail})`;
    case 'FAILED':
      return `${head} | ${result.category} ${result.errorType}: ${result.reason}`;
  }
}

export function formatReport(report: BatchReport): string[] {
  return [
    ...report.results.map(describeResult),
    `Orders: ${report.successCount} succeeded, ${report.failedCount} failed, ${report.rejectedCount} rejected`,
    `Cash spent: $${report.totalNotionalSpent.toFixed(3)}`,
  ];
}

const percent = (weight: number): string => `${(weight * 100).toFixed(2)}%`;
const dollars = (cents: number): string => `$${(cents / 100).toFixed(2)}`;

export function formatCategories(summaries: readonly CategorySummary[]): string[] {
  return summaries.map(
    (summary) =>
      `${summary.name}: ${dollars(summary.currentValue)} -> ${dollars(summary.projectedValue)} ` +
      `(${percent(summary.projectedWeight)} of target ${percent(summary.targetWeight)})`
  );
}
