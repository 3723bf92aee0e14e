import { nanoid } from "nanoid";

/**
 * Generates a new unit-of-work id.
 *
 * Uses nanoid: URL-safe, 21 characters, secure random.
 */
export function generateId(): string {
  return nanoid();
}

/**
 * ID generator function type.
 */
export type IdGenerator = () => string;
