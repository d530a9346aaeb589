export class InvalidSpeedError extends Error {
  constructor(readonly speedKmh: number) {
    super(`Speed must be a positive number of km/h, got ${speedKmh}`);
    this.name = 'InvalidSpeedError';
  }
}
