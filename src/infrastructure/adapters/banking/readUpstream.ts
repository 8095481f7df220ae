import { z } from 'zod';
import { NotAuthorizedError, ParseError, UpstreamError } from '../../../domain/errors/AppError.js';
import { HttpResponse } from '../../http/FetchTransport.js';

/** Maps an upstream response onto the error taxonomy, then validates its body. */
export const readUpstream = <S extends z.ZodTypeAny>(response: HttpResponse, path: string, schema: S): z.output<S> => {
  if (response.status === 401) {
    throw new NotAuthorizedError(path);
  }

  if (response.status < 200 || response.status >= 300) {
    throw new UpstreamError(response.status, path, response.body);
  }

  const parsed = schema.safeParse(response.body);

  if (!parsed.success) {
    throw new ParseError(`Unexpected response shape from ${path}`, {
      path,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return parsed.data;
};
