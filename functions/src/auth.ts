/**
 * Auth Utilities for Firebase Cloud Functions
 *
 * Firebase ID token verification for the log parsing endpoint.
 */

// Error types for auth failures
export class AuthError extends Error {
  constructor(
    message: string,
    public statusCode: number = 401
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * The part of firebase-admin's Auth used here
 */
export interface TokenVerifier {
  verifyIdToken(idToken: string): Promise<{ uid: string }>;
}

export interface AuthorizedRequest {
  headers: { authorization?: string };
}

/**
 * Verify Firebase ID token from Authorization header
 *
 * @param req - The incoming request with Authorization header
 * @param verifier - admin.auth() in production
 * @returns Decoded token uid
 * @throws AuthError if token is missing, malformed, or invalid
 */
export async function verifyAuth(
  req: AuthorizedRequest,
  verifier: TokenVerifier
): Promise<string> {
  const authHeader = req.headers.authorization;

  if (!authHeader) {
    throw new AuthError('Missing Authorization header');
  }

  if (!authHeader.startsWith('Bearer ')) {
    throw new AuthError('Invalid Authorization header format. Expected: Bearer <token>');
  }

  const idToken = authHeader.split('Bearer ')[1];

  if (!idToken || idToken.trim() === '') {
    throw new AuthError('Empty token in Authorization header');
  }

  try {
    const decodedToken = await verifier.verifyIdToken(idToken);
    return decodedToken.uid;
  } catch (error) {
    // Firebase auth errors have a 'code' property
    const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;

    if (code === 'auth/id-token-expired') {
      throw new AuthError('Token expired', 401);
    }

    if (code === 'auth/id-token-revoked') {
      throw new AuthError('Token revoked', 401);
    }

    if (code === 'auth/invalid-id-token') {
      throw new AuthError('Invalid token', 401);
    }

    // Log unexpected errors for debugging
    console.error('Token verification failed:', error instanceof Error ? error.message : error);
    throw new AuthError('Token verification failed', 401);
  }
}
