import { randomBytes, createHash } from 'crypto';
import { AuthState } from '../../types/music';

// 32 random bytes -> 43 base64url chars, the PKCE minimum
export function generateCodeVerifier(): string {
  return randomBytes(32).toString('base64url');
}

export function codeChallengeFor(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

// Generate state for OAuth flow
export function generateOAuthState(): string {
  return randomBytes(16).toString('hex');
}

export function generatePkceState(): AuthState {
  const codeVerifier = generateCodeVerifier();
  return {
    codeVerifier,
    codeChallenge: codeChallengeFor(codeVerifier),
    state: generateOAuthState(),
  };
}
