export * from './DdnsError';
