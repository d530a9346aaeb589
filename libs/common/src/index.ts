export * from './constants';
export * from './date.util';
export * from './number.util';
export * from './compass';
export * from './fetch-error';
export * from './http.util';
