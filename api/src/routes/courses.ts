import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import {
  API_VERSION,
  enumArrayParam,
  paginationSchema,
  sortDirectionSchema,
  stringOrArrayParam,
} from './sharedSchemas.js';
import {
  DEFAULT_GLOBAL_WEIGHT,
  GROUP_KEYS,
  SORT_KEYS,
  executeCourseSearch,
  type CourseRankingQuery,
} from '../queries/course_search.js';
import { EXPORT_DEFAULT_ROWS, EXPORT_MAX_ROWS, exportCourses } from '../queries/course_export.js';
import { parseAlevelGrades } from '../pipeline/grade_parser.js';
import { DOMAINS } from '../pipeline/subject_classifier.js';

const courseRankingFields = {
  university: stringOrArrayParam,
  domain: enumArrayParam(DOMAINS),
  studyMode: stringOrArrayParam,
  duration: stringOrArrayParam,
  q: z.string().trim().min(1).optional(),
  grades: z.string().trim().min(1).optional(),
  ibPoints: z.coerce.number().int().min(24).max(45).optional(),
  weight: z.coerce.number().min(0).max(1).default(DEFAULT_GLOBAL_WEIGHT),
  sortBy: z.enum(SORT_KEYS).optional(),
  sortDir: sortDirectionSchema.optional(),
};

function requireParsableGrades(value: { grades?: string }, ctx: z.RefinementCtx) {
  if (value.grades !== undefined && parseAlevelGrades(value.grades) === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'grades must list A-Level grades such as AAB',
      path: ['grades'],
    });
  }
}

export const courseQuerySchema = paginationSchema(500, 50)
  .extend({
    ...courseRankingFields,
    groupBy: z.enum(GROUP_KEYS).optional(),
  })
  .superRefine(requireParsableGrades);

export const courseExportQuerySchema = z
  .object({
    ...courseRankingFields,
    limit: z.coerce.number().int().min(1).max(EXPORT_MAX_ROWS).default(EXPORT_DEFAULT_ROWS),
  })
  .superRefine(requireParsableGrades);

export type CoursesQuery = z.infer<typeof courseQuerySchema>;
export type CourseExportQuery = z.infer<typeof courseExportQuerySchema>;

const courseSummarySchema = z.object({
  courses: z.number().int(),
  universities: z.number().int(),
  domains: z.number().int(),
  withSubjectRankings: z.number().int(),
});

export async function registerCourseRoutes(app: FastifyInstance) {
  app.get(
    '/courses',
    {
      schema: {
        querystring: courseQuerySchema,
        response: {
          200: z.object({
            meta: z.object({
              page: z.number().int(),
              pageSize: z.number().int(),
              total: z.number().int(),
              hasNext: z.boolean(),
              weight: z.number(),
              summary: courseSummarySchema,
              generatedAt: z.string(),
              version: z.string(),
            }),
            data: z.array(z.record(z.string(), z.unknown())),
            groups: z
              .array(
                z.object({
                  key: z.string(),
                  count: z.number().int(),
                  records: z.array(z.record(z.string(), z.unknown())),
                }),
              )
              .optional(),
          }),
        },
      },
    },
    async (request) => {
      const query = request.query as CoursesQuery;
      const { records } = request.server.container.masterCache.get();
      const startedAt = process.hrtime.bigint();
      const { data, total, groups, summary } = executeCourseSearch(records, query);
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
      const meta = {
        page: query.page,
        pageSize: query.pageSize,
        total,
        hasNext: !groups && query.page * query.pageSize < total,
        weight: query.weight,
        summary,
        generatedAt: new Date().toISOString(),
        version: API_VERSION,
      };
      request.log.info(
        {
          event: 'query.metrics',
          target: 'courses',
          durationMs,
          totalMatching: total,
          totalReturned: groups ? total : data.length,
          page: query.page,
          pageSize: query.pageSize,
          filters: summarizeCourseFilters(query),
        },
        'courses query executed',
      );

      return groups ? { meta, data, groups } : { meta, data };
    },
  );

  app.get(
    '/courses/export',
    {
      schema: {
        querystring: courseExportQuerySchema,
      },
    },
    async (request, reply) => {
      const { limit, ...ranking } = request.query as CourseExportQuery;
      const { records } = request.server.container.masterCache.get();
      const startedAt = process.hrtime.bigint();
      const { csv, exported, total } = exportCourses(records, ranking, limit);
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
      request.log.info(
        {
          event: 'query.metrics',
          target: 'courses.export',
          durationMs,
          totalMatching: total,
          totalReturned: exported,
          limit,
          filters: summarizeCourseFilters(ranking),
        },
        'courses export generated',
      );

      return reply
        .header('content-type', 'text/csv; charset=utf-8')
        .header('content-disposition', 'attachment; filename="courses.csv"')
        .header('x-total-count', String(total))
        .send(csv);
    },
  );
}

function summarizeCourseFilters(query: CourseRankingQuery & { groupBy?: CoursesQuery['groupBy'] }) {
  return {
    university: query.university ?? [],
    domain: query.domain ?? [],
    studyMode: query.studyMode ?? [],
    duration: query.duration ?? [],
    hasSearchQuery: Boolean(query.q),
    grades: query.grades,
    ibPoints: query.ibPoints,
    weight: query.weight,
    sort: query.sortBy ? { by: query.sortBy, direction: query.sortDir } : undefined,
    groupBy: query.groupBy,
  };
}
