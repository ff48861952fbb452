import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { Content, isTextPart } from '../../cloudcode/interfaces';

export const SESSION_ID_LENGTH = 32;

/**
 * Hashes the text of the first user turn so that a conversation keeps the same
 * session across requests. Falls back to a random id when there is no user text.
 */
export function deriveSessionId(contents: Content[]): string {
  for (const content of contents) {
    if (content.role.toLowerCase() !== 'user') continue;

    const texts = content.parts
      .filter(isTextPart)
      .map((part) => part.text)
      .filter((text) => text !== '');
    if (texts.length === 0) continue;

    return createHash('sha256')
      .update(texts.join('\n'))
      .digest('hex')
      .slice(0, SESSION_ID_LENGTH);
  }

  return uuidv4();
}
