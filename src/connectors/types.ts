// src/connectors/types.ts

import type { HttpCore } from '../core/http/HttpCore';
import type { Logger } from '../observability/Logger';

export interface SessionDeps {
  http: HttpCore;
  logger: Logger;
}
