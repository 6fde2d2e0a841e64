import dotenv from 'dotenv';

const result = dotenv.config();

// A missing .env is normal in containers; anything else is worth a line on stderr.
const loadError = result.error;
if (loadError && !('code' in loadError && loadError.code === 'ENOENT')) {
  // Avoid pulling in logger here (load order); console is enough.
  console.warn(`[env] Failed to load .env: ${loadError.message}`);
}
