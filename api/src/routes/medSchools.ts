import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { buildMeta, enumArrayParam, optionalBooleanParam, stringOrArrayParam } from './sharedSchemas.js';
import { listMedicalSchools } from '../queries/med_schools.js';

const ADMISSION_TEST_CATEGORIES = ['UCAT', 'Other', 'Unknown'] as const;

const medSchoolQuerySchema = z.object({
  university: stringOrArrayParam,
  testCategory: enumArrayParam(ADMISSION_TEST_CATEGORIES),
  smcOnly: optionalBooleanParam,
});

type MedSchoolQuery = z.infer<typeof medSchoolQuerySchema>;

export async function registerMedSchoolRoutes(app: FastifyInstance) {
  app.get('/med-schools', { schema: { querystring: medSchoolQuerySchema } }, async (request) => {
    const query = request.query as MedSchoolQuery;
    const { medSchools } = request.server.container.masterCache.get();
    const data = listMedicalSchools(medSchools, {
      universities: query.university,
      testCategories: query.testCategory,
      smcOnly: query.smcOnly,
    });
    request.log.info(
      {
        event: 'query.metrics',
        target: 'med-schools',
        totalMatching: data.length,
        filters: {
          university: query.university ?? [],
          testCategory: query.testCategory ?? [],
          smcOnly: query.smcOnly ?? false,
        },
      },
      'medical schools query executed',
    );
    return {
      meta: { ...buildMeta(), total: data.length },
      data,
    };
  });
}
