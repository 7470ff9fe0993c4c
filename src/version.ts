import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');

export const VERSION =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
