import { LIMITS } from '../constants/index.js';
import { parseCsvList } from './parsing.js';

export type ValidationResult = { valid: true } | { valid: false; error: string };

const OK: ValidationResult = { valid: true };

function fail(error: string): ValidationResult {
  return { valid: false, error };
}

const USER_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;
const TAG_PATTERN = /^[a-zA-Z0-9 _-]+$/;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
// eslint-disable-next-line no-control-regex
const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

export function validateUserId(userId: unknown): ValidationResult {
  if (userId === undefined || userId === null || userId === '') return fail('User ID is required');
  if (typeof userId !== 'string') return fail('User ID must be a string');
  if (userId.length < LIMITS.USER_ID_MIN_LENGTH || userId.length > LIMITS.USER_ID_MAX_LENGTH) {
    return fail(`User ID must be between ${LIMITS.USER_ID_MIN_LENGTH} and ${LIMITS.USER_ID_MAX_LENGTH} characters`);
  }
  if (!USER_ID_PATTERN.test(userId)) {
    return fail('User ID can only contain letters, numbers, hyphens, and underscores');
  }
  return OK;
}

export function validateImageId(imageId: unknown): ValidationResult {
  if (typeof imageId !== 'string' || !imageId) return fail('Image ID is required');
  if (!UUID_PATTERN.test(imageId.toLowerCase())) return fail('Invalid image ID format');
  return OK;
}

export function validateContentType(contentType: unknown, allowedTypes: readonly string[]): ValidationResult {
  if (typeof contentType !== 'string' || !contentType) return fail('Content type is required');
  const wanted = contentType.toLowerCase();
  if (!allowedTypes.some((allowed) => allowed.toLowerCase() === wanted)) {
    return fail(`Content type '${contentType}' is not allowed. Allowed types: ${allowedTypes.join(', ')}`);
  }
  return OK;
}

function toMb(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

export function validateFileSize(size: unknown, maxSize: number): ValidationResult {
  if (typeof size !== 'number' || !Number.isInteger(size)) return fail('File size must be an integer');
  if (size <= 0) return fail('File size must be greater than 0');
  if (size > maxSize) {
    return fail(`File size (${toMb(size)} MB) exceeds maximum allowed size (${toMb(maxSize)} MB)`);
  }
  return OK;
}

export function validateTags(
  tags: unknown,
  maxTags: number = LIMITS.MAX_TAGS,
  maxTagLength: number = LIMITS.MAX_TAG_LENGTH
): ValidationResult {
  if (!Array.isArray(tags)) return fail('Tags must be a list');
  if (tags.length > maxTags) return fail(`Maximum ${maxTags} tags allowed`);

  for (const tag of tags) {
    if (typeof tag !== 'string') return fail('Each tag must be a string');
    if (!tag.trim()) return fail('Tags cannot be empty');
    if (tag.length > maxTagLength) {
      return fail(`Tag '${tag.slice(0, 20)}...' exceeds maximum length of ${maxTagLength} characters`);
    }
    if (!TAG_PATTERN.test(tag)) return fail(`Tag '${tag}' contains invalid characters`);
  }
  return OK;
}

export function validateDescription(
  description: unknown,
  maxLength: number = LIMITS.MAX_DESCRIPTION_LENGTH
): ValidationResult {
  if (description === undefined || description === null) return OK;
  if (typeof description !== 'string') return fail('Description must be a string');
  if (description.length > maxLength) return fail(`Description exceeds maximum length of ${maxLength} characters`);
  return OK;
}

export function validateDimension(name: string, value: unknown): ValidationResult {
  if (typeof value !== 'number' || !Number.isInteger(value)) return fail(`${name} must be a valid integer`);
  if (value <= 0) return fail(`${name} must be greater than 0`);
  return OK;
}

/**
 * Reduces a client-supplied filename to a single safe path segment.
 * Keeps the extension when the name has to be truncated.
 */
export function sanitizeFilename(filename: unknown, maxLength: number = LIMITS.MAX_FILENAME_LENGTH): string {
  const raw = typeof filename === 'string' ? filename : '';
  if (!raw) return 'unnamed';

  const base = raw.split('/').pop()?.split('\\').pop() ?? '';
  let name = base.replace(UNSAFE_FILENAME_CHARS, '_').replace(/^[ .]+|[ .]+$/g, '');

  if (name.length > maxLength) {
    const dot = name.lastIndexOf('.');
    const ext = dot > 0 ? name.slice(dot + 1) : '';
    const stemLength = maxLength - ext.length - 1;
    // an extension that leaves no room for a stem is cut like the rest of the name
    name = ext && stemLength > 0 ? `${name.slice(0, stemLength)}.${ext}` : name.slice(0, maxLength);
  }

  return name || 'unnamed';
}

/** `"a, b,,c"` → `["a", "b", "c"]`. Query strings carry tags this way. */
export function parseTagList(csv: unknown): string[] {
  return parseCsvList(csv);
}
