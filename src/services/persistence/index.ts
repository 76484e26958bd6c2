export { TradeRecorder } from './TradeRecorder.js';
export type { TradeRecorderOptions } from './TradeRecorder.js';
