import {
  ApiKeyRecord,
  ApiKeyRepository,
  ApiKeyUpdate,
  UserRecord,
  UserRepository,
} from '../repositories/types';
import { AuthenticationError, NotFoundError } from '../utils/errors';
import { generateApiKey } from '../utils/generateToken';
import { Page, PaginationOptions } from '../utils/pagination';
import { createLogger } from '../utils/logger';

const log = createLogger('api-keys');

export interface NewApiKeyInput {
  name: string;
  isActive?: boolean;
  expiresAt?: Date | null;
}

export interface Principal {
  user: UserRecord;
  apiKey: ApiKeyRecord;
}

export class ApiKeyService {
  constructor(
    private readonly apiKeys: ApiKeyRepository,
    private readonly users: UserRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Resolve a presented key to its owner, recording the use. Unknown keys, inactive or
   * expired keys and keys of inactive users are rejected.
   */
  async authenticate(key: string): Promise<Principal> {
    const apiKey = await this.apiKeys.findByKey(key);
    if (!apiKey) {
      throw new AuthenticationError('Invalid API key.');
    }

    const now = this.now();
    if (!apiKey.isActive) {
      throw new AuthenticationError('API key is inactive.');
    }
    if (apiKey.expiresAt && apiKey.expiresAt.getTime() <= now.getTime()) {
      throw new AuthenticationError('API key has expired.');
    }

    const user = await this.users.findById(apiKey.userId);
    if (!user || !user.isActive) {
      throw new AuthenticationError('User inactive or deleted.');
    }

    await this.apiKeys.markUsed(apiKey.id, now);
    return { user, apiKey: { ...apiKey, lastUsedAt: now } };
  }

  async create(userId: string, input: NewApiKeyInput): Promise<ApiKeyRecord> {
    const apiKey = await this.apiKeys.create({
      name: input.name,
      key: generateApiKey(),
      userId,
      isActive: input.isActive,
      expiresAt: input.expiresAt,
    });
    log.info(`Issued API key ${apiKey.id} (${apiKey.name})`, { userId });
    return apiKey;
  }

  list(userId: string, search: string | undefined, options: PaginationOptions): Promise<Page<ApiKeyRecord>> {
    return this.apiKeys.listForUser(userId, search, options);
  }

  async get(userId: string, id: string): Promise<ApiKeyRecord> {
    const apiKey = await this.apiKeys.findForUser(id, userId);
    if (!apiKey) {
      throw new NotFoundError('API key not found');
    }
    return apiKey;
  }

  async update(userId: string, id: string, patch: ApiKeyUpdate): Promise<ApiKeyRecord> {
    const apiKey = await this.apiKeys.update(id, userId, patch);
    if (!apiKey) {
      throw new NotFoundError('API key not found');
    }
    return apiKey;
  }

  async delete(userId: string, id: string): Promise<void> {
    const deleted = await this.apiKeys.delete(id, userId);
    if (!deleted) {
      throw new NotFoundError('API key not found');
    }
    log.info(`Revoked API key ${id}`, { userId });
  }
}
