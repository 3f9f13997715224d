import { randomUUID } from "node:crypto";

/**
 * Request identifier (UUIDv4) for responses that arrive without one.
 */
export const generateId = (): string => randomUUID();
