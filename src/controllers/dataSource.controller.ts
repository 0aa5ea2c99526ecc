import { Request, Response } from 'express';
import { pickBy } from 'lodash';
import { AppContext } from '../container';
import { DataSourceUpdate } from '../repositories/types';
import { serializeDataSource } from '../serializers/dataSource.serializer';
import { createdResponse, noContentResponse, paginatedResponse, successResponse } from '../utils/apiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { getPaginationOptions } from '../utils/pagination';
import { parseInput } from '../utils/validation';
import {
  DATA_SOURCE_ORDERING,
  DataSourceBody,
  createDataSourceSchema,
  listDataSourcesSchema,
  updateDataSourceSchema,
} from '../validations/dataSource.validation';

const toUpdate = (body: Partial<DataSourceBody>): DataSourceUpdate =>
  pickBy(
    {
      name: body.name,
      sourceType: body.source_type,
      connectionString: body.connection_string,
      isActive: body.is_active,
      metadata: body.metadata,
    },
    (value) => value !== undefined
  );

export const createDataSourceController = ({ dataSources }: AppContext) => ({
  // @desc    List data sources
  // @route   GET /data-sources
  // @access  Private
  list: asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(listDataSourcesSchema, req.query);
    const options = getPaginationOptions(query, DATA_SOURCE_ORDERING, { name: 1 });

    const page = await dataSources.list(
      { sourceType: query.source_type, isActive: query.is_active, search: query.search || undefined },
      options
    );
    return paginatedResponse(res, page.items.map(serializeDataSource), page.total, page.page, page.limit);
  }),

  // @desc    Register a data source
  // @route   POST /data-sources
  // @access  Private
  create: asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(createDataSourceSchema, req.body);
    const source = await dataSources.create({
      name: body.name,
      sourceType: body.source_type,
      connectionString: body.connection_string,
      isActive: body.is_active,
      metadata: body.metadata,
    });
    return createdResponse(res, serializeDataSource(source), 'Data source created');
  }),

  // @desc    Get a data source
  // @route   GET /data-sources/:id
  // @access  Private
  get: asyncHandler(async (req: Request, res: Response) => {
    const source = await dataSources.get(req.params.id);
    return successResponse(res, serializeDataSource(source));
  }),

  // @desc    Replace a data source
  // @route   PUT /data-sources/:id
  // @access  Private
  replace: asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(createDataSourceSchema, req.body);
    const source = await dataSources.update(req.params.id, toUpdate(body));
    return successResponse(res, serializeDataSource(source), 'Data source updated');
  }),

  // @desc    Partially update a data source
  // @route   PATCH /data-sources/:id
  // @access  Private
  update: asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(updateDataSourceSchema, req.body);
    const source = await dataSources.update(req.params.id, toUpdate(body));
    return successResponse(res, serializeDataSource(source), 'Data source updated');
  }),

  // @desc    Delete a data source and its jobs
  // @route   DELETE /data-sources/:id
  // @access  Private
  remove: asyncHandler(async (req: Request, res: Response) => {
    await dataSources.delete(req.params.id);
    return noContentResponse(res);
  }),
});
