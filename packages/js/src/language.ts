import { Logger, warn } from './logger.js';

const LANGUAGE_TAG = /^[a-zA-Z]{1,8}(-[a-zA-Z0-9]{1,8})*$/;

export function isWellFormedLanguageTag(tag: string): boolean {
  return LANGUAGE_TAG.test(tag);
}

/** Lowercases a BCP 47 tag, warning when it is not well-formed. */
export function normalizeLanguage(tag: string, logger: Logger): string {
  if (!isWellFormedLanguageTag(tag)) {
    warn(logger, { code: 'malformed language tag', message: `Language tag "${tag}" is not well-formed` });
  }
  return tag.toLowerCase();
}
