export { Topics, RelaySubjects, topicForTarget, parseTopic } from './topics';
export * from './frames';
export * from './commands';
export * from './events';
export { RelayFrameSchema, type RelayFrame } from './relay';
export * from './serialize';
export * from './api/auth';
export * from './api/channel';
export * from './api/conversation';
export * from './api/message';
export * from './api/user';
export { MessageEventPublisher, type TopicPublisher, type PublishOptions } from './publisher';
