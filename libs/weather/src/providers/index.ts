export * from './yr.provider';
