import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { RequestContext } from './request-context';

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction) {
    const data = RequestContext.bindRequest(req);
    res.setHeader('x-request-id', data.requestId);
    RequestContext.run(data, () => next());
  }
}
