import { randomUUID } from 'crypto';
import { Router } from 'express';
import type { DiseaseListResponse, Observation, SpeciesListResponse } from '../../shared/types';
import type { AppContext } from './context';
import { RequestValidationError } from './errors';
import { isValidDateString, parseBbox, parseSpeciesList } from './services/geoFeatureFilter';
import { GEO_LAYER_TYPES, isGeoLayerType } from './services/geoLayer';
import { observationInputSchema } from './services/observationRepository';

const DEFAULT_OBSERVATION_LIMIT = 100;
const MAX_OBSERVATION_LIMIT = 1000;
const DEFAULT_CATALOG_LIMIT = 50;
const MAX_CATALOG_LIMIT = 200;

function readQueryString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return readQueryString(value[0]);
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function readIntegerParam(value: unknown, name: string): number | undefined {
  const raw = readQueryString(value);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new RequestValidationError(`${name} must be an integer.`);
  }
  return parsed;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function readDateParam(value: unknown, name: string): string | undefined {
  const raw = readQueryString(value);
  if (raw !== undefined && !isValidDateString(raw)) {
    throw new RequestValidationError(`Invalid ${name} format. Use YYYY-MM-DD`);
  }
  return raw;
}

function readLanguage(value: unknown, context: AppContext): string {
  return readQueryString(value) ?? context.config.defaultLanguage;
}

export function createFilterOptionsRouter(context: AppContext): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const language = readLanguage(req.query.lang, context);
    res.json(context.filterOptions.getFilterOptions(language));
  });

  return router;
}

export function createGeoRouter(context: AppContext): Router {
  const router = Router();

  router.get('/:layerType', async (req, res, next) => {
    try {
      const { layerType } = req.params;
      if (!isGeoLayerType(layerType)) {
        throw new RequestValidationError(`Invalid layer type. Valid types are: ${GEO_LAYER_TYPES.join(', ')}`);
      }

      const rawBbox = readQueryString(req.query.bbox);
      const bbox = parseBbox(rawBbox);
      if (rawBbox !== undefined && !bbox) {
        throw new RequestValidationError('Invalid bbox format. Use min_lon,min_lat,max_lon,max_lat');
      }

      const limit = readIntegerParam(req.query.limit, 'limit');
      const collection = await context.geoLayers.getGeoLayer(layerType, {
        species: parseSpeciesList(readQueryString(req.query.species)),
        bbox,
        startDate: readDateParam(req.query.start_date, 'start_date'),
        endDate: readDateParam(req.query.end_date, 'end_date'),
        limit: limit !== undefined && limit > 0 ? limit : undefined,
      });
      res.json(collection);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createObservationRouter(context: AppContext): Router {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const parsed = observationInputSchema.safeParse(req.body);
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
          .join('; ');
        throw new RequestValidationError(`Invalid observation: ${detail}`);
      }

      const input = parsed.data;
      const observation: Observation = {
        ...input,
        id: input.id ?? randomUUID(),
        user_id: input.user_id || randomUUID(),
        metadata: input.metadata ?? {},
      };

      const created = await context.observations.create(observation);
      console.info(`[observations] Created observation ${created.id}.`);
      res.status(201).json(created);
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (req, res, next) => {
    try {
      const limit = readIntegerParam(req.query.limit, 'limit') ?? DEFAULT_OBSERVATION_LIMIT;
      const offset = readIntegerParam(req.query.offset, 'offset') ?? 0;
      const result = await context.observations.list({
        userId: readQueryString(req.query.user_id),
        speciesId: readQueryString(req.query.species_id),
        limit: clamp(limit, 1, MAX_OBSERVATION_LIMIT),
        offset: Math.max(offset, 0),
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createSpeciesRouter(context: AppContext): Router {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const limit = readIntegerParam(req.query.limit, 'limit') ?? DEFAULT_CATALOG_LIMIT;
      const species = await context.species.listSpecies({
        language: readLanguage(req.query.lang, context),
        search: readQueryString(req.query.search),
        limit: clamp(limit, 1, MAX_CATALOG_LIMIT),
      });
      const payload: SpeciesListResponse = { count: species.length, species };
      res.json(payload);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:speciesId', async (req, res, next) => {
    try {
      const language = readLanguage(req.query.lang, context);
      const detail = await context.species.getSpecies(req.params.speciesId, language);
      if (!detail) {
        res.status(404).json({ message: 'Species not found.' });
        return;
      }
      res.json(detail);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:speciesId/diseases', async (req, res, next) => {
    try {
      const language = readLanguage(req.query.lang, context);
      res.json(await context.diseases.getDiseasesByVector(req.params.speciesId, language));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createVectorSpeciesRouter(context: AppContext): Router {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const species = await context.species.getVectorSpecies({
        language: readLanguage(req.query.lang, context),
        diseaseId: readQueryString(req.query.disease_id),
      });
      res.json(species);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createDiseaseRouter(context: AppContext): Router {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const limit = readIntegerParam(req.query.limit, 'limit') ?? DEFAULT_CATALOG_LIMIT;
      const diseases = await context.diseases.listDiseases({
        language: readLanguage(req.query.lang, context),
        search: readQueryString(req.query.search),
        limit: clamp(limit, 1, MAX_CATALOG_LIMIT),
      });
      const payload: DiseaseListResponse = { count: diseases.length, diseases };
      res.json(payload);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:diseaseId', async (req, res, next) => {
    try {
      const disease = await context.diseases.getDisease(req.params.diseaseId, readLanguage(req.query.lang, context));
      if (!disease) {
        res.status(404).json({ message: 'Disease not found.' });
        return;
      }
      res.json(disease);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:diseaseId/vectors', async (req, res, next) => {
    try {
      const language = readLanguage(req.query.lang, context);
      const disease = await context.diseases.getDisease(req.params.diseaseId, language);
      if (!disease) {
        res.status(404).json({ message: 'Disease not found.' });
        return;
      }
      res.json(await context.species.getVectorSpecies({ language, diseaseId: disease.id }));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
