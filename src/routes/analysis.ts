import { Router } from 'express';
import { z } from 'zod';
import { getExtractionTables } from '../config/extractionTables';
import { analysisRateLimiter } from '../middleware/rateLimiter';
import { buildBoldSpanIndex } from '../services/boldSpans';
import { companyFromEntities, companyFromSection } from '../services/companies';
import { segmentDocument } from '../services/segmentation';
import { flatTokenListSchema, inferInterval, linkTokens } from '../services/temporal';

const router = Router();

const literalMatchMode = z.enum(['exact', 'legacy-substring']);

const anchorPairSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
});

const segmentSchema = z.object({
  characters: z
    .array(
      z.object({
        text: z.string(),
        isBold: z.boolean(),
        pageIndex: z.number().int().min(0),
        globalOffset: z.number().int().min(0),
      })
    )
    .max(2_000_000),
  numeralMatch: literalMatchMode.optional(),
  sectionAnchors: anchorPairSchema.optional(),
  summaryAnchors: anchorPairSchema.optional(),
});

const intervalSchema = z.object({
  tokens: flatTokenListSchema,
  fiscalMarkerMatch: literalMatchMode.optional(),
});

const companySchema = z
  .object({
    section: z.string().optional(),
    entities: z.array(z.object({ text: z.string(), label: z.string() })).optional(),
    similarityThreshold: z.number().min(0).max(1).optional(),
  })
  .refine((body) => body.section !== undefined || body.entities !== undefined, {
    message: 'Provide a section, entities, or both',
  });

router.post('/segment', analysisRateLimiter, (req, res, next) => {
  try {
    const { characters, numeralMatch, sectionAnchors, summaryAnchors } = segmentSchema.parse(req.body);
    const { fullText, index } = buildBoldSpanIndex(characters, { numeralMatch });
    const segmentation = segmentDocument(fullText, index, { sectionAnchors, summaryAnchors });

    res.json({
      textLength: fullText.length,
      boldWords: Object.fromEntries(index),
      segmentation,
    });
  } catch (error) {
    next(error);
  }
});

router.post('/interval', analysisRateLimiter, (req, res, next) => {
  try {
    const { tokens, fiscalMarkerMatch } = intervalSchema.parse(req.body);
    const result = inferInterval(linkTokens(tokens), getExtractionTables(), { fiscalMarkerMatch });

    res.json(result);
  } catch (error) {
    next(error);
  }
});

router.post('/company', analysisRateLimiter, (req, res, next) => {
  try {
    const { section, entities, similarityThreshold } = companySchema.parse(req.body);

    const fromEntities = entities ? companyFromEntities(entities, { similarityThreshold }) : undefined;
    if (fromEntities) {
      res.json({ companyName: fromEntities, source: 'entities' });
      return;
    }

    const fromSection = section !== undefined ? companyFromSection(section) : undefined;
    res.json({
      companyName: fromSection ?? null,
      source: fromSection ? 'section' : null,
    });
  } catch (error) {
    next(error);
  }
});

export default router;
