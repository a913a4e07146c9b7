export * from './decisions';
export * from './RecordReconciler';
