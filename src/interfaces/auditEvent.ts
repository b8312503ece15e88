export interface AuditEvent {
    eventId: string;
    timestamp: string;
    city: string;
    storagePath: string;
    temperature: number;
    weatherCondition: string;
    fullMetadata: string;
}
