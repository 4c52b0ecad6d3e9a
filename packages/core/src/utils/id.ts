// packages/core/src/utils/id.ts

import { customAlphabet } from 'nanoid';

// Session ids name snapshot directories, so keep them lowercase and path-safe
const sessionSuffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 20);

/** Generate a session ID with "ses_" prefix. */
export function generateSessionId(): string {
  return `ses_${sessionSuffix()}`;
}
