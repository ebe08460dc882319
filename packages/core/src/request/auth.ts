import type { AuthCredentials } from '../types/request.js';

/**
 * Format credentials as an `authorization` header value
 */
export function formatAuthorization(credentials: AuthCredentials): string {
  switch (credentials.type) {
    case 'bearer':
      return `Bearer ${credentials.token}`;
    case 'basic': {
      const encoded = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString('base64');
      return `Basic ${encoded}`;
    }
  }
}
