import { randomUUID } from 'crypto';

/**
 * Generate a correlation ID for tracking one inbound event through the handlers
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Create a short correlation ID for display purposes (last 8 chars)
 */
export function getShortCorrelationId(correlationId: string): string {
  return correlationId.slice(-8);
}
