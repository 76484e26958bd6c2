export { ActivityBroker } from './activityBroker/index.js';
export { WalletPoller } from './walletPoller/index.js';
export { TradeRecorder } from './persistence/index.js';
export { CopyTradeEngine } from './copyTrading/index.js';
