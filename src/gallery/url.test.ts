import { getGalleryUrl, isValidUsername, parseUsername, LOGIN_URL } from './url';
import { InvalidInputError } from '../utils/errors';

describe('gallery urls', () => {
  it('should build the login URL', () => {
    expect(LOGIN_URL).toBe('https://untappd.com/login');
  });

  it('should build the gallery URL for a username', () => {
    expect(getGalleryUrl('hoppy_hannah')).toBe('https://untappd.com/user/hoppy_hannah/photos');
  });

  it('should keep dots and hyphens in usernames', () => {
    expect(getGalleryUrl('ale.fan-42')).toBe('https://untappd.com/user/ale.fan-42/photos');
  });
});

describe('isValidUsername', () => {
  it('should accept letters, digits, underscores, dots and hyphens', () => {
    expect(isValidUsername('Stout_Lover.99-x')).toBe(true);
  });

  it('should reject empty names, slashes, spaces and traversal', () => {
    expect(isValidUsername('')).toBe(false);
    expect(isValidUsername('alice/photos')).toBe(false);
    expect(isValidUsername('alice smith')).toBe(false);
    expect(isValidUsername('..')).toBe(false);
  });
});

describe('parseUsername', () => {
  it('should trim surrounding whitespace', () => {
    expect(parseUsername('  alice ')).toBe('alice');
  });

  it('should throw InvalidInputError for unusable names', () => {
    expect(() => parseUsername('bad/name')).toThrow(InvalidInputError);
    expect(() => parseUsername('bad/name')).toThrow('Invalid Untappd username: "bad/name"');
  });
});
