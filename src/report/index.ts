export * from './aggregator';
export * from './formatters';
