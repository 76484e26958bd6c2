export * from './trades.js';
