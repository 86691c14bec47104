export { InMemoryTimelineStore } from './timeline.memory';
export { InMemorySessionStore } from './session.memory';
