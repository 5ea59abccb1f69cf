import type { Currency, Query, QueryResult } from '../types.js';
import { CURRENCY_SYMBOLS } from './currency.js';

export const MALFORMED_INPUT_MESSAGE = 'please ask a question about rental listings';

const moneyFormat = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatMoney(amount: number, currency: Currency): string {
  return `${CURRENCY_SYMBOLS[currency]}${moneyFormat.format(amount)}`;
}

/** Non-`any` query fields as `key=value`, in a fixed order. */
export function describeCriteria(query: Query): string {
  const parts: string[] = [];
  if (query.bedrooms !== 'any') parts.push(`bedrooms=${query.bedrooms}`);
  if (query.location !== 'any') parts.push(`location=${query.location}`);
  if (query.propertyType !== 'any') parts.push(`type=${query.propertyType}`);
  return parts.length ? parts.join(', ') : 'any criteria';
}

function describeSubject(query: Query): string {
  const parts: string[] = [];
  if (query.bedrooms !== 'any') parts.push(plural(query.bedrooms, 'bedroom'));
  if (query.propertyType !== 'any') parts.push(query.propertyType);
  if (query.location !== 'any') parts.push(`in ${query.location}`);
  return parts.join(', ');
}

export function formatAnswer(query: Query, result: QueryResult): string {
  if (result.total === 0) {
    return `no listings found for ${describeCriteria(query)}`;
  }

  const { stats } = result;
  const subject = describeSubject(query);
  const lines = [`Found ${plural(result.total, 'listing')}${subject ? ` (${subject})` : ''}.`];

  if (stats.min !== undefined && stats.max !== undefined && stats.mean !== undefined) {
    const money = (n: number) => formatMoney(n, stats.currency);
    if (query.intent === 'average') {
      lines.push(`Average monthly rent: ${money(stats.mean)} across ${plural(stats.monthlyCount, 'listing')}.`);
    } else if (query.intent === 'minimum' && result.pick) {
      lines.push(`Cheapest: ${money(stats.min)} for "${result.pick.title}" in ${result.pick.location}.`);
    } else if (query.intent === 'maximum' && result.pick) {
      lines.push(`Most expensive: ${money(stats.max)} for "${result.pick.title}" in ${result.pick.location}.`);
    }
    lines.push(`Monthly rent ranges from ${money(stats.min)} to ${money(stats.max)} (average ${money(stats.mean)}).`);
  } else {
    lines.push('None of them state a monthly rent.');
  }

  if (stats.nonMonthly > 0) {
    lines.push(`${plural(stats.nonMonthly, 'listing')} priced per year, week or day left out of the figures.`);
  }
  if (result.truncated) {
    lines.push(`Showing the first ${result.matches.length}.`);
  }

  return lines.join(' ');
}
