/**
 * Untappd site URLs and username validation
 */

import { InvalidInputError } from '../utils/errors.js';

export const BASE_URL = 'https://untappd.com';
export const LOGIN_URL = `${BASE_URL}/login`;

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function isValidUsername(username: string): boolean {
  return USERNAME_PATTERN.test(username) && !username.includes('..');
}

/**
 * Validate and trim a username, throwing InvalidInputError when it is unusable
 */
export function parseUsername(input: string): string {
  const username = input.trim();
  if (!isValidUsername(username)) {
    throw InvalidInputError.fromInvalidUsername(input);
  }
  return username;
}

/**
 * Gallery page for a user, e.g. https://untappd.com/user/alice/photos
 */
export function getGalleryUrl(username: string): string {
  return `${BASE_URL}/user/${encodeURIComponent(username)}/photos`;
}
