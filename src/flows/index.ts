/**
 * Flow pipeline wiring
 */

import type { ProxyOptions } from '../config/options.js';
import type { ProxyHTTPClient } from '../proxy/http-client.js';
import { CheckpointAuthFlow } from './checkpoint/checkpoint.auth.js';
import { CheckpointLogFetcher, type LogFetcher } from './checkpoint/checkpoint.auto-fetch.js';
import type { FlowStateStore } from './core/flow-state.js';
import { RequestTransformer } from './request-transformer.js';
import { ResponseTransformer } from './response-transformer.js';

export interface FlowPipeline {
  requestTransformer: RequestTransformer;
  responseTransformer: ResponseTransformer;
}

export interface FlowPipelineDependencies {
  flowState: FlowStateStore;
  httpClient: ProxyHTTPClient;
  /** Replaces the HTTP-backed log fetcher */
  logFetcher?: LogFetcher;
}

export function createFlowPipeline(options: ProxyOptions, deps: FlowPipelineDependencies): FlowPipeline {
  const logFetcher = deps.logFetcher ?? new CheckpointLogFetcher(options, deps.httpClient);
  const authFlow = new CheckpointAuthFlow(options, deps.flowState, logFetcher);

  return {
    requestTransformer: new RequestTransformer(options, authFlow),
    responseTransformer: new ResponseTransformer(options, authFlow)
  };
}

export { RequestTransformer } from './request-transformer.js';
export { ResponseTransformer } from './response-transformer.js';
export { CheckpointAuthFlow } from './checkpoint/checkpoint.auth.js';
export { CheckpointLogFetcher, buildAutoFetchRequest } from './checkpoint/checkpoint.auto-fetch.js';
export type { AutoFetchResult, AutoFetchRequest, LogFetcher } from './checkpoint/checkpoint.auto-fetch.js';
export { transformLogRequest } from './checkpoint/checkpoint.logs.js';
export { transformGraphTokenRequest, GRAPH_DEFAULTS } from './microsoft-graph/microsoft-graph.token.js';
export { FlowStateStore } from './core/flow-state.js';
export type { FlowMetadata, CheckpointAuthMetadata } from './core/flow-state.js';
export { parseRequest, RequestSnapshot } from './core/payload-parser.js';
export { matchTarget, isSameEndpoint, isTargetHost } from './core/endpoint-matcher.js';
export { ResponseEnvelope, buildCheckpointTokenEnvelope } from './core/envelope.js';
export type { TokenEnvelope } from './core/envelope.js';
export type { ExchangeView, FlowTarget } from './core/types.js';
