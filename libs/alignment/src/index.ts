export * from './alignment.types';
export * from './alignment.errors';
export * from './segment-projector';
export * from './forecast-index';
export * from './alignment-engine';
export * from './series-extraction';
