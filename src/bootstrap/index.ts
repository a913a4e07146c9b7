export * from './ReconcileLoop';
