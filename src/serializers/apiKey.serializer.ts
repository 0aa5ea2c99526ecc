import { ApiKeyRecord, UserRecord } from '../repositories/types';

export interface UserResponse {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  date_joined: string;
}

export interface ApiKeyResponse {
  id: string;
  name: string;
  key: string;
  user: UserResponse;
  is_active: boolean;
  expires_at: string | null;
  last_used_at: string | null;
  created_at: string;
  updated_at: string;
}

const toIso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export const serializeUser = (user: UserRecord): UserResponse => ({
  id: user.id,
  username: user.username,
  email: user.email,
  first_name: user.firstName,
  last_name: user.lastName,
  date_joined: user.dateJoined.toISOString(),
});

export const serializeApiKey = (apiKey: ApiKeyRecord, owner: UserRecord): ApiKeyResponse => ({
  id: apiKey.id,
  name: apiKey.name,
  key: apiKey.key,
  user: serializeUser(owner),
  is_active: apiKey.isActive,
  expires_at: toIso(apiKey.expiresAt),
  last_used_at: toIso(apiKey.lastUsedAt),
  created_at: apiKey.createdAt.toISOString(),
  updated_at: apiKey.updatedAt.toISOString(),
});
