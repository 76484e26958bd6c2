export { ActivityBroker } from './ActivityBroker.js';
export type {
  ActivityBrokerOptions,
  ActivityCallback,
  BrokerStats,
  DispatchFailure,
  DispatchOutcome,
  PublishReceipt,
  Subscription,
} from './ActivityBroker.js';
