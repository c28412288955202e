// Core interfaces
export type { ILookupResult, IWireLookupResult } from './ILookupResult';
export { toWireResult } from './ILookupResult';
export type { IClientPolicy, IPolicyOverrides } from './IClientPolicy';
export { DEFAULT_CLIENT_POLICY } from './IClientPolicy';
export type { QueryInput, IQueryRequest } from './IQueryRequest';
export type { StreamEvent, IStartEvent, IResultEvent, IErrorEvent, ICompleteEvent } from './IStreamEvent';
