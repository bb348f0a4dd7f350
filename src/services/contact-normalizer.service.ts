import logger from '../utils/logger';

const EMAIL_PATTERN = /[\w.-]+@[\w.-]+\.\w+/g;

/**
 * Cleans the contact field returned by the model.
 *
 * Models sometimes echo the obfuscated form a page uses (`jane[at]example.com`,
 * `jane&#64;example.com`) next to, or instead of, the literal address it also found.
 * Every obfuscated variant of an address detected in the text is rewritten to the
 * plain address.
 */
export class ContactNormalizerService {
  normalize(raw: string | null | undefined): string {
    if (!raw) {
      return 'Unknown';
    }

    try {
      const emails = raw.match(EMAIL_PATTERN) ?? [];

      let cleaned = raw.replaceAll('\\n', ' ').replace(/\s+/g, ' ');

      for (const email of emails) {
        cleaned = cleaned
          .replaceAll(email.replace('@', '[at]'), email)
          .replaceAll(email.replace('@', '&#64;'), email);
      }

      return cleaned.trim();
    } catch (error) {
      logger.error('Error cleaning contact info, keeping original value:', error);
      return raw;
    }
  }
}
