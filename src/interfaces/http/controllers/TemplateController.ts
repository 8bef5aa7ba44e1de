/**
 * Template Controller — Inspect How a Format Compiles
 * Layer: Interfaces (HTTP)
 *
 * Lets an operator check a candidate ACCESS_LOG_FORMAT before deploying it:
 * the body's format is run through the same parser the access logger uses
 * and the resulting segments come back as JSON. Unknown field names are not
 * rejected here, exactly as at startup; they simply render empty.
 *
 * `active` returns the template the running service compiled at startup.
 * Arrow-function properties keep `this` bound when Express calls them.
 */
import type { AccessLogService } from '@application/services/AccessLogService';
import { parse } from '@application/template/tagParser';
import type { CompileTemplateBody } from '@shared/types';
import type { Request, Response } from 'express';

export class TemplateController {
  constructor(private readonly service: AccessLogService) {}

  compile = (req: Request, res: Response): void => {
    const { format } = req.body as CompileTemplateBody;

    res.status(200).json({
      status: 'success',
      data: { format, segments: parse(format) },
    });
  };

  active = (_req: Request, res: Response): void => {
    res.status(200).json({
      status: 'success',
      data: { segments: this.service.compiled },
    });
  };
}
