export * from './auditor';
export * from './discovery';
