import { Provider } from '@nestjs/common';

/** Returns a float in [0, 1). Swapped for a fixed sequence in tests. */
export type RandomSource = () => number;

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export const randomSourceProvider: Provider = {
  provide: RANDOM_SOURCE,
  useValue: Math.random,
};
