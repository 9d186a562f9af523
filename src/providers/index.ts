export type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
export { LOG_LEVELS } from './ILogProvider.js';
export { BaseLogProvider } from './BaseLogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export type { INotificationSink, Notification, NotificationEvent } from './INotificationSink.js';
export { partnershipTopic, userTopic } from './INotificationSink.js';
export { SupabaseRealtimeNotificationSink } from './SupabaseRealtimeNotificationSink.js';
