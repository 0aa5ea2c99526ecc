import { Request, Response } from 'express';
import { AppContext } from '../container';
import { serializeEtlJob } from '../serializers/etlJob.serializer';
import { createdResponse, paginatedResponse, successResponse } from '../utils/apiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { getPaginationOptions } from '../utils/pagination';
import { parseInput } from '../utils/validation';
import { ETL_JOB_ORDERING, createEtlJobSchema, listEtlJobsSchema } from '../validations/etlJob.validation';

export const createEtlJobController = ({ lifecycle, etlJobs }: AppContext) => ({
  // @desc    List ETL jobs
  // @route   GET /etl-jobs
  // @access  Private
  list: asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(listEtlJobsSchema, req.query);
    const options = getPaginationOptions(query, ETL_JOB_ORDERING, { createdAt: -1 });

    const page = await etlJobs.list(
      {
        statuses: query.status,
        dataSourceId: query.data_source,
        dataSourceName: query.data_source_name,
        name: query.name,
        nameContains: query.name__icontains,
        search: query.search || undefined,
        createdAfter: query.created_after,
        createdBefore: query.created_before,
        startedAfter: query.started_after,
        startedBefore: query.started_before,
        completedAfter: query.completed_after,
        completedBefore: query.completed_before,
        minRecords: query.min_records,
        maxRecords: query.max_records,
        hasErrors: query.has_errors,
      },
      options
    );
    return paginatedResponse(res, page.items.map(serializeEtlJob), page.total, page.page, page.limit);
  }),

  // @desc    Create an ETL job and dispatch it
  // @route   POST /etl-jobs
  // @access  Private
  create: asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(createEtlJobSchema, req.body);
    const job = await lifecycle.createJob({
      name: body.name,
      dataSourceId: body.data_source,
      configuration: body.configuration ?? {},
    });
    return createdResponse(res, serializeEtlJob(await etlJobs.toView(job)), 'ETL job created');
  }),

  // @desc    Get an ETL job
  // @route   GET /etl-jobs/:id
  // @access  Private
  get: asyncHandler(async (req: Request, res: Response) => {
    const job = await lifecycle.getJob(req.params.id);
    return successResponse(res, serializeEtlJob(await etlJobs.toView(job)));
  }),

  // @desc    Retry a failed or cancelled ETL job
  // @route   POST /etl-jobs/:id/retry
  // @access  Private
  retry: asyncHandler(async (req: Request, res: Response) => {
    const job = await lifecycle.retryJob(req.params.id);
    return successResponse(res, serializeEtlJob(await etlJobs.toView(job)), 'ETL job queued for retry');
  }),
});
