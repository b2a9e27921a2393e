import type { ResourceKind } from '../types/resources';

// Kubernetes quantity suffixes: binary multipliers and decimal SI exponents
const BINARY_SUFFIXES: Record<string, number> = {
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
  Pi: 1024 ** 5,
  Ei: 1024 ** 6
};

const DECIMAL_EXPONENTS: Record<string, number> = {
  n: -9,
  u: -6,
  m: -3,
  '': 0,
  k: 3,
  M: 6,
  G: 9,
  T: 12,
  P: 15,
  E: 18
};

function scaleByPowerOfTen(value: number, exponent: number): number {
  // Dividing keeps "100m" at exactly 0.1
  return exponent < 0 ? value / 10 ** -exponent : value * 10 ** exponent;
}

const QUANTITY_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+))(?:[eE]([+-]?\d+)|(Ki|Mi|Gi|Ti|Pi|Ei|n|u|m|k|M|G|T|P|E))?$/;

// Parse a quantity string (e.g. "100m", "1Gi", "500000000n", "1e3") into base units.
// Returns null when the string is not a valid quantity.
export function parseResourceQuantity(quantity: string): number | null {
  const match = QUANTITY_PATTERN.exec(quantity.trim());
  if (!match) return null;

  const [, digits, exponent, suffix = ''] = match;
  const value = Number(digits);
  const binary = BINARY_SUFFIXES[suffix];
  const decimal = exponent !== undefined ? Number(exponent) : DECIMAL_EXPONENTS[suffix];

  let result: number;
  if (binary !== undefined) {
    result = value * binary;
  } else if (decimal !== undefined) {
    result = scaleByPowerOfTen(value, decimal);
  } else {
    return null;
  }
  return Number.isFinite(result) ? result : null;
}

// Millicores keep microcore precision; bytes round up like the API server does
export function toCanonical(resource: ResourceKind, baseUnits: number): number {
  if (resource === 'cpu') {
    return Math.round(baseUnits * 1_000_000) / 1000;
  }
  return Math.ceil(Math.round(baseUnits * 1000) / 1000);
}

export function formatCpu(millicores: number): string {
  return `${Number(millicores.toFixed(3))}m`;
}

const MEMORY_UNITS: [string, number][] = [
  ['Ei', 1024 ** 6],
  ['Pi', 1024 ** 5],
  ['Ti', 1024 ** 4],
  ['Gi', 1024 ** 3],
  ['Mi', 1024 ** 2],
  ['Ki', 1024]
];

// Largest binary unit that divides the value exactly, plain bytes otherwise
export function formatMemory(bytes: number): string {
  if (bytes > 0) {
    for (const [unit, size] of MEMORY_UNITS) {
      if (bytes % size === 0) return `${bytes / size}${unit}`;
    }
  }
  return `${bytes}`;
}

export function formatQuantity(resource: ResourceKind, value: number): string {
  return resource === 'cpu' ? formatCpu(value) : formatMemory(value);
}
