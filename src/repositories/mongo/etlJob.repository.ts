import { EtlJob, IEtlJob } from '../../models';
import { Page, PaginationOptions, SortSpec } from '../../utils/pagination';
import {
  EtlJobFilter,
  EtlJobRecord,
  EtlJobRepository,
  JobStatus,
  JobTransitionGuard,
  JobTransitionPatch,
  NewEtlJob,
} from '../types';
import { buildEtlJobQuery } from './queries';

const toRecord = (doc: IEtlJob): EtlJobRecord => ({
  id: doc._id,
  name: doc.name,
  status: doc.status,
  dataSourceId: doc.dataSource,
  startedAt: doc.startedAt ?? null,
  completedAt: doc.completedAt ?? null,
  recordsProcessed: doc.recordsProcessed,
  errorMessage: doc.errorMessage ?? '',
  recoveryAttempts: doc.recoveryAttempts ?? 0,
  configuration: doc.configuration ?? {},
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoEtlJobRepository implements EtlJobRepository {
  async create(input: NewEtlJob): Promise<EtlJobRecord> {
    const doc = await EtlJob.create({
      name: input.name,
      dataSource: input.dataSourceId,
      configuration: input.configuration ?? {},
    });
    return toRecord(doc);
  }

  async findById(id: string): Promise<EtlJobRecord | null> {
    const doc = await EtlJob.findById(id);
    return doc ? toRecord(doc) : null;
  }

  async list(filter: EtlJobFilter, options: PaginationOptions): Promise<Page<EtlJobRecord>> {
    const query = buildEtlJobQuery(filter);
    const [docs, total] = await Promise.all([
      EtlJob.find(query).sort(options.sort).skip(options.skip).limit(options.limit),
      EtlJob.countDocuments(query),
    ]);
    return { items: docs.map(toRecord), total, page: options.page, limit: options.limit };
  }

  async find(filter: EtlJobFilter, sort: SortSpec, limit?: number): Promise<EtlJobRecord[]> {
    const cursor = EtlJob.find(buildEtlJobQuery(filter)).sort(sort);
    const docs = limit !== undefined ? await cursor.limit(limit) : await cursor;
    return docs.map(toRecord);
  }

  count(filter: EtlJobFilter = {}): Promise<number> {
    return EtlJob.countDocuments(buildEtlJobQuery(filter)).exec();
  }

  async countByDataSource(dataSourceIds: string[]): Promise<Map<string, number>> {
    const rows = await EtlJob.aggregate<{ _id: string; count: number }>([
      { $match: { dataSource: { $in: dataSourceIds } } },
      { $group: { _id: '$dataSource', count: { $sum: 1 } } },
    ]);
    return new Map(rows.map((row) => [row._id, row.count]));
  }

  async transition(
    id: string,
    from: readonly JobStatus[],
    patch: JobTransitionPatch,
    guard: JobTransitionGuard = {}
  ): Promise<EtlJobRecord | null> {
    const doc = await EtlJob.findOneAndUpdate(
      {
        _id: id,
        status: { $in: [...from] },
        ...(guard.startedBefore ? { startedAt: { $lt: guard.startedBefore } } : {}),
      },
      { $set: patch },
      { new: true, runValidators: true }
    );
    return doc ? toRecord(doc) : null;
  }

  async deleteByDataSource(dataSourceId: string): Promise<number> {
    const result = await EtlJob.deleteMany({ dataSource: dataSourceId });
    return result.deletedCount;
  }
}
