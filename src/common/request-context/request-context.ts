import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import { Request } from 'express';

export interface RequestContextData {
  requestId: string;
  ip?: string;
  userAgent?: string;
}

const storage = new AsyncLocalStorage<RequestContextData>();

export class RequestContext {
  static run(data: RequestContextData, callback: () => void) {
    storage.run(data, callback);
  }

  static get(): RequestContextData | undefined {
    return storage.getStore();
  }

  static bindRequest(req: Request): RequestContextData {
    const header = req.headers['x-request-id'];
    const forwarded = req.headers['x-forwarded-for'];
    const forwardedIp = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return {
      requestId: (typeof header === 'string' && header) || randomUUID(),
      ip: (req.ip || forwardedIp || '').split(',')[0].trim(),
      userAgent: req.headers['user-agent'],
    };
  }
}
