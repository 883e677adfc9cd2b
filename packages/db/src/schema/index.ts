export * from './catalog';
export * from './customers';
export * from './orders';
