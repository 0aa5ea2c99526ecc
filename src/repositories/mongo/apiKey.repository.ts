import { escapeRegExp } from 'lodash';
import { ApiKey, IApiKey } from '../../models';
import { Page, PaginationOptions } from '../../utils/pagination';
import { ApiKeyRecord, ApiKeyRepository, ApiKeyUpdate, NewApiKey } from '../types';

const toRecord = (doc: IApiKey): ApiKeyRecord => ({
  id: doc._id,
  name: doc.name,
  key: doc.key,
  userId: doc.user,
  isActive: doc.isActive,
  expiresAt: doc.expiresAt ?? null,
  lastUsedAt: doc.lastUsedAt ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoApiKeyRepository implements ApiKeyRepository {
  async create(input: NewApiKey): Promise<ApiKeyRecord> {
    const doc = await ApiKey.create({
      name: input.name,
      key: input.key,
      user: input.userId,
      isActive: input.isActive ?? true,
      expiresAt: input.expiresAt ?? null,
    });
    return toRecord(doc);
  }

  async findByKey(key: string): Promise<ApiKeyRecord | null> {
    const doc = await ApiKey.findOne({ key });
    return doc ? toRecord(doc) : null;
  }

  async findForUser(id: string, userId: string): Promise<ApiKeyRecord | null> {
    const doc = await ApiKey.findOne({ _id: id, user: userId });
    return doc ? toRecord(doc) : null;
  }

  async listForUser(
    userId: string,
    search: string | undefined,
    options: PaginationOptions
  ): Promise<Page<ApiKeyRecord>> {
    const query = search
      ? { user: userId, name: { $regex: escapeRegExp(search), $options: 'i' } }
      : { user: userId };
    const [docs, total] = await Promise.all([
      ApiKey.find(query).sort(options.sort).skip(options.skip).limit(options.limit),
      ApiKey.countDocuments(query),
    ]);
    return { items: docs.map(toRecord), total, page: options.page, limit: options.limit };
  }

  async update(id: string, userId: string, patch: ApiKeyUpdate): Promise<ApiKeyRecord | null> {
    const doc = await ApiKey.findOneAndUpdate(
      { _id: id, user: userId },
      { $set: patch },
      { new: true, runValidators: true }
    );
    return doc ? toRecord(doc) : null;
  }

  async delete(id: string, userId: string): Promise<boolean> {
    const result = await ApiKey.deleteOne({ _id: id, user: userId });
    return result.deletedCount > 0;
  }

  async markUsed(id: string, at: Date): Promise<void> {
    await ApiKey.updateOne({ _id: id }, { $set: { lastUsedAt: at } });
  }
}
