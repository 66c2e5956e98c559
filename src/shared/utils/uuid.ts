/**
 * UUID Utility
 * Time-ordered ids (uuid v7) used to tag dictation sessions in logs
 */

import { v7 as uuidv7 } from 'uuid';

export function generateId(): string {
  return uuidv7();
}
