export { NotificationPublisher, summarizeSchedule, buildProvisionedEvent } from './notification.types';
export { QueueNotificationPublisher, LoggingNotificationPublisher } from './notification.publisher';
