// src/core/auth/types.ts

import { z } from 'zod';

export interface OAuthClientConfig {
  apiUrl: string;
  clientId: string;
  clientSecret?: string;
  timeoutMs: number;
}

export type GrantType = 'password' | 'refresh_token';

export const TokenEndpointResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().nonnegative().optional(),
  token_type: z.string().optional(),
});

export type TokenEndpointResponse = z.infer<typeof TokenEndpointResponseSchema>;
