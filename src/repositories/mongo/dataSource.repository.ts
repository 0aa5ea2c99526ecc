import { escapeRegExp } from 'lodash';
import { DataSource, IDataSource, NAME_COLLATION } from '../../models';
import { Page, PaginationOptions, SortSpec } from '../../utils/pagination';
import {
  DataSourceFilter,
  DataSourceRecord,
  DataSourceRepository,
  DataSourceUpdate,
  NewDataSource,
} from '../types';
import { buildDataSourceQuery } from './queries';

const toRecord = (doc: IDataSource): DataSourceRecord => ({
  id: doc._id,
  name: doc.name,
  sourceType: doc.sourceType,
  connectionString: doc.connectionString,
  isActive: doc.isActive,
  metadata: doc.metadata ?? {},
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoDataSourceRepository implements DataSourceRepository {
  async create(input: NewDataSource): Promise<DataSourceRecord> {
    const doc = await DataSource.create(input);
    return toRecord(doc);
  }

  async findById(id: string): Promise<DataSourceRecord | null> {
    const doc = await DataSource.findById(id);
    return doc ? toRecord(doc) : null;
  }

  async findByIds(ids: string[]): Promise<DataSourceRecord[]> {
    const docs = await DataSource.find({ _id: { $in: ids } });
    return docs.map(toRecord);
  }

  async findByName(name: string): Promise<DataSourceRecord | null> {
    const doc = await DataSource.findOne({ name: name.trim() }).collation(NAME_COLLATION);
    return doc ? toRecord(doc) : null;
  }

  async findIdsByNameContains(fragment: string): Promise<string[]> {
    const docs = await DataSource.find({ name: { $regex: escapeRegExp(fragment), $options: 'i' } }).select('_id');
    return docs.map((doc) => doc._id);
  }

  async list(filter: DataSourceFilter, options: PaginationOptions): Promise<Page<DataSourceRecord>> {
    const query = buildDataSourceQuery(filter);
    const [docs, total] = await Promise.all([
      DataSource.find(query).sort(options.sort).skip(options.skip).limit(options.limit),
      DataSource.countDocuments(query),
    ]);
    return { items: docs.map(toRecord), total, page: options.page, limit: options.limit };
  }

  async find(filter: DataSourceFilter, sort: SortSpec, limit?: number): Promise<DataSourceRecord[]> {
    const cursor = DataSource.find(buildDataSourceQuery(filter)).sort(sort);
    const docs = limit !== undefined ? await cursor.limit(limit) : await cursor;
    return docs.map(toRecord);
  }

  count(filter: DataSourceFilter = {}): Promise<number> {
    return DataSource.countDocuments(buildDataSourceQuery(filter)).exec();
  }

  async update(id: string, patch: DataSourceUpdate): Promise<DataSourceRecord | null> {
    const doc = await DataSource.findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true });
    return doc ? toRecord(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await DataSource.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }
}
