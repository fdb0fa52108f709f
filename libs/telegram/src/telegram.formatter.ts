import { DateTime } from 'luxon';

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');

const formatTime = (date: Date): string =>
  `${DateTime.fromJSDate(date, { zone: 'UTC' }).toFormat('yyyy-LL-dd HH:mm:ss')} UTC`;

export const formatStartupMessage = (readiness: Record<string, boolean>, now = new Date()): string => {
  const names = Object.keys(readiness).sort();
  const ready = names.filter((name) => readiness[name]);
  const rows = names.map((name) => `${readiness[name] ? '✅' : '❌'} ${escapeHtml(name)}`);
  return [
    '<b>🚀 Market data service started</b>',
    `<b>Providers ready:</b> ${ready.length}/${names.length}`,
    ...rows,
    `<i>${formatTime(now)}</i>`,
  ].join('\n');
};

export const formatHealthIssueMessage = (title: string, details: string, now = new Date()): string =>
  [`<b>⚠️ ${escapeHtml(title)}</b>`, escapeHtml(details), `<i>${formatTime(now)}</i>`].join('\n');

export const formatErrorMessage = (context: string, message: string, now = new Date()): string =>
  [
    `<b>🔴 Error in ${escapeHtml(context)}</b>`,
    `<code>${escapeHtml(message.slice(0, 500))}</code>`,
    `<i>${formatTime(now)}</i>`,
  ].join('\n');

export const formatHeartbeatMessage = (
  summary: Record<string, string | number>,
  now = new Date(),
): string =>
  [
    '<b>💓 Heartbeat</b>',
    ...Object.entries(summary).map(([key, value]) => `<b>${escapeHtml(key)}:</b> ${escapeHtml(String(value))}`),
    `<i>${formatTime(now)}</i>`,
  ].join('\n');
