import type { Stage } from './types';

export class NoWorkError extends Error {
  constructor(public readonly stage: Stage) {
    super(`No papers available for the ${stage} stage`);
    this.name = 'NoWorkError';
  }
}
