/**
 * User record as stored, including the password hash
 */
export interface User {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  created_at: string;
}

/**
 * User fields safe to return to clients
 */
export type PublicUser = Omit<User, 'password_hash'>;

/**
 * Outcome of validating a bearer token. Why a token was rejected is not reported.
 */
export type TokenValidation =
  | { valid: true; subject: string }
  | { valid: false };

/**
 * Response body of a successful login
 */
export interface AccessTokenResponse {
  access_token: string;
  token_type: 'bearer';
}

declare global {
  namespace Express {
    interface Request {
      /** Set by requireAuth once the bearer token resolves to a stored user */
      user?: PublicUser;
    }
  }
}
