// src/cop.ts
import fs from 'node:fs';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const CopPointSchema = z.object({
  outdoor_dry_bulb_C: z.number(),
  max: z.number().positive(),
}).passthrough();

const ModeSpecsSchema = z.object({
  COP_points: z.record(z.string(), CopPointSchema).default({}),
});

const HeatPumpFileSchema = z.object({
  heat_pump_performance_specs: z.object({
    heating: ModeSpecsSchema.default({}),
    cooling: ModeSpecsSchema.default({}),
  }).default({}),
}).passthrough();

export type CopPoint = z.infer<typeof CopPointSchema>;

/** Coefficients in ascending power order: c[0] + c[1]·x + c[2]·x² */
export interface Polynomial {
  coefficients: number[];
}

export interface CopModels {
  heat: Polynomial;
  cool: Polynomial;
}

export function evaluate(p: Polynomial, x: number): number {
  let y = 0;
  for (let i = p.coefficients.length - 1; i >= 0; i--) {
    y = y * x + (p.coefficients[i] ?? 0);
  }
  return y;
}

/**
 * Least-squares polynomial fit. The degree drops to (points − 1) when there
 * are too few points for the requested one.
 */
export function polyfit(xs: number[], ys: number[], degree = 2): Polynomial {
  if (xs.length !== ys.length) throw new Error('polyfit: xs and ys differ in length');
  if (xs.length === 0) throw new Error('polyfit: no points');

  const n = Math.min(degree, xs.length - 1) + 1;

  // normal equations A·c = b with A[i][j] = Σx^(i+j), b[i] = Σy·x^i
  const A: number[][] = Array.from({ length: n }, () => new Array<number>(n + 1).fill(0));
  for (let k = 0; k < xs.length; k++) {
    const x = xs[k] ?? 0;
    const y = ys[k] ?? 0;
    for (let i = 0; i < n; i++) {
      const row = A[i];
      if (!row) continue;
      for (let j = 0; j < n; j++) row[j] = (row[j] ?? 0) + x ** (i + j);
      row[n] = (row[n] ?? 0) + y * x ** i;
    }
  }

  return { coefficients: solve(A, n) };
}

/** Gauss-Jordan with partial pivoting on an n×(n+1) augmented matrix */
function solve(A: number[][], n: number): number[] {
  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(A[r]?.[col] ?? 0) > Math.abs(A[pivot]?.[col] ?? 0)) pivot = r;
    }
    const pr = A[pivot];
    const cr = A[col];
    if (!pr || !cr) throw new Error('polyfit: malformed system');
    A[pivot] = cr;
    A[col] = pr;

    const p = pr[col] ?? 0;
    if (Math.abs(p) < 1e-12) throw new Error('polyfit: points do not determine a polynomial (repeated temperatures?)');
    for (let j = col; j <= n; j++) pr[j] = (pr[j] ?? 0) / p;

    for (let r = 0; r < n; r++) {
      const row = A[r];
      if (r === col || !row) continue;
      const f = row[col] ?? 0;
      for (let j = col; j <= n; j++) row[j] = (row[j] ?? 0) - f * (pr[j] ?? 0);
    }
  }
  return A.map(row => row[n] ?? 0);
}

export function fitCopModel(points: CopPoint[]): Polynomial {
  return polyfit(points.map(p => p.outdoor_dry_bulb_C), points.map(p => p.max), 2);
}

/** Reads heat-pump.yaml and fits one quadratic COP curve per mode */
export function loadCopModels(file: string): CopModels {
  if (!fs.existsSync(file)) throw new ConfigError(`${file}: heat pump performance file not found`);

  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = HeatPumpFileSchema.safeParse(doc ?? {});
  if (!parsed.success) throw ConfigError.fromZod(file, parsed.error);

  const specs = parsed.data.heat_pump_performance_specs;
  const build = (mode: 'heating' | 'cooling'): Polynomial => {
    const points = Object.values(specs[mode].COP_points);
    if (!points.length) throw new ConfigError(`${file}: no ${mode} COP_points`);
    try {
      return fitCopModel(points);
    } catch (e) {
      throw new ConfigError(`${file}: ${mode} COP model: ${e instanceof Error ? e.message : String(e)}`);
    }
  };

  const models = { heat: build('heating'), cool: build('cooling') };
  logger.debug(`COP models fitted from ${file}`);
  return models;
}
