import { describe, expect, it } from 'vitest';

import { DEFAULT_ALLOWED_CONTENT_TYPES, LIMITS } from '../constants/index.js';
import { clampInt, parseBool, parseCsvList } from '../lib/parsing.js';
import {
  parseTagList,
  sanitizeFilename,
  validateContentType,
  validateDescription,
  validateDimension,
  validateFileSize,
  validateImageId,
  validateTags,
  validateUserId,
} from '../lib/validation.js';

const MAX = LIMITS.DEFAULT_MAX_IMAGE_SIZE;

describe('validateUserId', () => {
  it('accepts letters, digits, hyphens and underscores', () => {
    expect(validateUserId('user_123-x')).toEqual({ valid: true });
  });

  it('requires a value', () => {
    expect(validateUserId(undefined)).toEqual({ valid: false, error: 'User ID is required' });
    expect(validateUserId('')).toEqual({ valid: false, error: 'User ID is required' });
  });

  it('rejects ids outside 3..128 characters', () => {
    expect(validateUserId('ab')).toEqual({ valid: false, error: 'User ID must be between 3 and 128 characters' });
    expect(validateUserId('a'.repeat(129)).valid).toBe(false);
    expect(validateUserId('a'.repeat(128)).valid).toBe(true);
  });

  it('rejects other characters', () => {
    expect(validateUserId('user@1')).toEqual({
      valid: false,
      error: 'User ID can only contain letters, numbers, hyphens, and underscores',
    });
  });
});

describe('validateImageId', () => {
  it('accepts uuids regardless of case', () => {
    expect(validateImageId('123E4567-E89B-12D3-A456-426614174000')).toEqual({ valid: true });
  });

  it('rejects malformed ids', () => {
    expect(validateImageId('not-a-uuid')).toEqual({ valid: false, error: 'Invalid image ID format' });
    expect(validateImageId('123e4567e89b12d3a456426614174000').valid).toBe(false);
    expect(validateImageId('')).toEqual({ valid: false, error: 'Image ID is required' });
  });
});

describe('validateContentType', () => {
  it('matches case-insensitively', () => {
    expect(validateContentType('IMAGE/PNG', DEFAULT_ALLOWED_CONTENT_TYPES)).toEqual({ valid: true });
  });

  it('lists the allowed types when rejecting', () => {
    expect(validateContentType('application/pdf', DEFAULT_ALLOWED_CONTENT_TYPES)).toEqual({
      valid: false,
      error: "Content type 'application/pdf' is not allowed. Allowed types: image/jpeg, image/jpg, image/png, image/gif, image/webp",
    });
  });

  it('requires a value', () => {
    expect(validateContentType('', DEFAULT_ALLOWED_CONTENT_TYPES)).toEqual({ valid: false, error: 'Content type is required' });
  });
});

describe('validateFileSize', () => {
  it('accepts sizes up to the maximum', () => {
    expect(validateFileSize(1, MAX)).toEqual({ valid: true });
    expect(validateFileSize(MAX, MAX)).toEqual({ valid: true });
  });

  it('rejects non-positive sizes', () => {
    expect(validateFileSize(0, MAX)).toEqual({ valid: false, error: 'File size must be greater than 0' });
    expect(validateFileSize(-5, MAX)).toEqual({ valid: false, error: 'File size must be greater than 0' });
  });

  it('reports sizes above the maximum in MB', () => {
    expect(validateFileSize(15 * 1024 * 1024, MAX)).toEqual({
      valid: false,
      error: 'File size (15.00 MB) exceeds maximum allowed size (10.00 MB)',
    });
    expect(validateFileSize(MAX + 1, MAX).valid).toBe(false);
  });

  it('rejects fractional sizes', () => {
    expect(validateFileSize(1.5, MAX)).toEqual({ valid: false, error: 'File size must be an integer' });
  });
});

describe('validateTags', () => {
  it('accepts up to ten well-formed tags', () => {
    const tags = Array.from({ length: 10 }, (_, i) => `tag ${i}`);
    expect(validateTags(tags)).toEqual({ valid: true });
  });

  it('rejects more than ten tags', () => {
    const tags = Array.from({ length: 11 }, (_, i) => `t${i}`);
    expect(validateTags(tags)).toEqual({ valid: false, error: 'Maximum 10 tags allowed' });
  });

  it('rejects tags longer than 50 characters', () => {
    expect(validateTags(['a'.repeat(51)])).toEqual({
      valid: false,
      error: `Tag '${'a'.repeat(20)}...' exceeds maximum length of 50 characters`,
    });
    expect(validateTags(['a'.repeat(50)])).toEqual({ valid: true });
  });

  it('rejects blank tags and invalid characters', () => {
    expect(validateTags(['  '])).toEqual({ valid: false, error: 'Tags cannot be empty' });
    expect(validateTags(['bad!tag'])).toEqual({ valid: false, error: "Tag 'bad!tag' contains invalid characters" });
    expect(validateTags('vacation')).toEqual({ valid: false, error: 'Tags must be a list' });
  });
});

describe('validateDescription', () => {
  it('is optional', () => {
    expect(validateDescription(undefined)).toEqual({ valid: true });
    expect(validateDescription(null)).toEqual({ valid: true });
  });

  it('caps the length at 500 characters', () => {
    expect(validateDescription('x'.repeat(500))).toEqual({ valid: true });
    expect(validateDescription('x'.repeat(501))).toEqual({
      valid: false,
      error: 'Description exceeds maximum length of 500 characters',
    });
  });
});

describe('validateDimension', () => {
  it('requires a positive integer', () => {
    expect(validateDimension('width', 1920)).toEqual({ valid: true });
    expect(validateDimension('width', 0)).toEqual({ valid: false, error: 'width must be greater than 0' });
    expect(validateDimension('height', 10.5)).toEqual({ valid: false, error: 'height must be a valid integer' });
  });
});

describe('sanitizeFilename', () => {
  it('drops path components', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\photos\\cat.jpg')).toBe('cat.jpg');
  });

  it('replaces reserved characters and trims dots and spaces', () => {
    expect(sanitizeFilename('my<file>.png')).toBe('my_file_.png');
    expect(sanitizeFilename('  .hidden. ')).toBe('hidden');
  });

  it('falls back to unnamed', () => {
    expect(sanitizeFilename('')).toBe('unnamed');
    expect(sanitizeFilename('...')).toBe('unnamed');
    expect(sanitizeFilename(undefined)).toBe('unnamed');
  });

  it('keeps the extension when truncating', () => {
    const result = sanitizeFilename(`${'a'.repeat(300)}.jpg`);
    expect(result).toHaveLength(255);
    expect(result.endsWith('.jpg')).toBe(true);
  });

  it('cuts an overlong extension to the limit', () => {
    expect(sanitizeFilename(`a.${'x'.repeat(20)}`, 10)).toBe('a.xxxxxxxx');
    expect(sanitizeFilename(`photo.${'e'.repeat(9)}`, 10)).toBe('photo.eeee');
    expect(sanitizeFilename('abcdefghij.png', 8)).toBe('abcd.png');
  });
});

describe('parsing helpers', () => {
  it('splits comma lists', () => {
    expect(parseCsvList(' a, b,,c ')).toEqual(['a', 'b', 'c']);
    expect(parseCsvList(undefined)).toEqual([]);
  });

  it('parses tag lists from query strings', () => {
    expect(parseTagList('sunset, beach')).toEqual(['sunset', 'beach']);
    expect(parseTagList('')).toEqual([]);
  });

  it('parses boolean flags', () => {
    expect(parseBool('true')).toBe(true);
    expect(parseBool('TRUE')).toBe(true);
    expect(parseBool('0')).toBe(false);
    expect(parseBool(undefined)).toBe(false);
  });

  it('clamps integers', () => {
    expect(clampInt(5000, 1, 3600, 900)).toBe(3600);
    expect(clampInt(Number.NaN, 1, 3600, 900)).toBe(900);
    expect(clampInt(12.7, 1, 3600, 900)).toBe(12);
  });
});
