// src/core/token/types.ts

export interface Token {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly obtainedAt: Date;
  readonly expiresInMs: number; // Infinity when the server gave no lifetime
  readonly tokenType?: string;
}

export interface PasswordCredentials {
  mode: 'password';
  username: string;
  password: string;
  initialRefreshToken?: string; // Tried before the password grant
}

export interface RefreshTokenCredentials {
  mode: 'refreshToken';
  refreshToken: string;
}

export type Credentials = PasswordCredentials | RefreshTokenCredentials;

export interface TokenReplacedEvent {
  version: number;
  expiresAt?: Date;
}
