// Shared formatting helpers for the scene writer and the generators

export function escapeXml(text: string): string {
  return String(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function formatNumber(n: number): string {
  // Keep simple, avoid locales for output stability
  if (Number.isInteger(n)) return String(n);
  return (Math.round(n * 100) / 100).toString();
}

// Fixed decimals without a "-0.00"
export function formatFixed(n: number, digits: number): string {
  const text = n.toFixed(digits);
  return /^-0\.?0*$/.test(text) ? text.slice(1) : text;
}

export function formatPx(n: number): string {
  return `${formatNumber(n)}px`;
}

export function formatPercent(n: number): string {
  return `${formatFixed(n, 1)}%`;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
