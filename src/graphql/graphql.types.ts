import type { HttpTransport } from "../http/http.types.js";
import type { JsonValue, QueryCatalog, ResourceLogger } from "../types/index.js";

export interface QueryEngineOptions {
  endpoint: string;
  token: string;
  queries: QueryCatalog;
  transport: HttpTransport;
  logger?: ResourceLogger;
}

export interface PageInfo {
  endCursor: string | null;
  hasNextPage: boolean;
}

export interface PageData {
  items: JsonValue[];
  pageInfo: PageInfo;
}
