export { Order } from './Order';
export { ObservedTransaction } from './ObservedTransaction';
export { Campaign } from './Campaign';
export { ScheduledPost } from './ScheduledPost';
export { PollerCursor } from './PollerCursor';
export { AuditEntry } from './AuditEntry';
