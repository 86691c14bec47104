export { reduce, replayTimeline, DEFAULT_ASSISTANT_ROLE } from './reducer';
