export * from './gpx-parser.interface';
export * from './geo-utils';
export * from './togeojson-parser';
