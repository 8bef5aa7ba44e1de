/**
 * Template Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET  /api/v1/templates/active   →  controller.active
 *   POST /api/v1/templates/compile  →  controller.compile  { "format": "{method} {uri}" }
 *
 * Built per app from the AccessLogService createApp() resolved, so the
 * "active" template is the one that app's access logger renders.
 */
import type { AccessLogService } from '@application/services/AccessLogService';
import { TemplateController } from '@interfaces/http/controllers/TemplateController';
import { validate } from '@interfaces/http/middleware/validation';
import { Router } from 'express';
import { z } from 'zod';

const compileTemplateSchema = z.object({
  format: z.string('format must be a string').min(1, 'format must not be empty'),
});

export function createTemplateRoutes(service: AccessLogService): Router {
  const router = Router();
  const controller = new TemplateController(service);

  router.get('/templates/active', controller.active);
  router.post('/templates/compile', validate(compileTemplateSchema, 'body'), controller.compile);

  return router;
}
