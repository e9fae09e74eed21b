export * from './Asset';
export * from './Holding';
export * from './Offer';
export * from './AuditEvent';
