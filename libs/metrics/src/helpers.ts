import { register, Counter, Gauge, type Registry } from 'prom-client';

interface SeriesOptions<T extends string> {
  name: string;
  help: string;
  labelNames?: readonly T[];
  /** Defaults to the global registry */
  registry?: Registry;
}

export function createCounter<T extends string = string>(opts: SeriesOptions<T>): Counter<T> {
  return new Counter({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames ?? [],
    registers: [opts.registry ?? register],
  });
}

export function createGauge<T extends string = string>(opts: SeriesOptions<T>): Gauge<T> {
  return new Gauge({
    name: opts.name,
    help: opts.help,
    labelNames: opts.labelNames ?? [],
    registers: [opts.registry ?? register],
  });
}
