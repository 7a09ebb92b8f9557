import { randomUUID } from 'crypto';

/** Prefixed random identifier, e.g. `alert_3f2c…`. */
export function generateId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '')}`;
}
