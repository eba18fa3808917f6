export { parseFeedParam, parseStopParam } from './params';
export { createWatchdogActions } from './actions';
export { createWatchdogPoller } from './poller';
export { createNodeTimerApi } from './timer';

export type {
  TimerAPI,
  FeedParams,
  ActionResult,
  WatchdogActions,
  PollerConfig,
  WatchdogPoller
} from './types';
