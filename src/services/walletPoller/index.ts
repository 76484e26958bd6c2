export { WalletPoller } from './WalletPoller.js';
export type { WalletPollerOptions, WalletPollStatus, PollCycleResult } from './WalletPoller.js';
