/**
 * ExpressFormRequest
 *
 * FormRequest over an express request. Input is the query string merged
 * with the parsed body (body wins on conflicts).
 */

import type { Request } from 'express';
import type { FormData } from '@stepwise/core/domain';
import type { FormRequest } from '@stepwise/core/ports';
import { isAttributes } from './session-attributes.js';

export class ExpressFormRequest implements FormRequest {
  constructor(private readonly req: Request) {}

  get method(): string {
    return this.req.method.toUpperCase();
  }

  get url(): string {
    return this.req.originalUrl;
  }

  input(): FormData {
    const query: FormData = isAttributes(this.req.query) ? this.req.query : {};
    const body: unknown = this.req.body;
    return { ...query, ...(isAttributes(body) ? body : {}) };
  }

  get(key: string): unknown {
    return this.input()[key];
  }

  /**
   * True when the most acceptable content type is JSON.
   */
  wantsJson(): boolean {
    const [preferred] = this.req.accepts();
    const type = preferred?.toLowerCase() ?? '';
    return type.includes('/json') || type.includes('+json');
  }
}
