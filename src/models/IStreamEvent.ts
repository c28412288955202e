import type { IWireLookupResult } from './ILookupResult';

export interface IStartEvent {
  type: 'start';
  total: number;
}

export interface IResultEvent extends IWireLookupResult {
  type: 'result';
  completed: number;
  total: number;
}

export interface IErrorEvent {
  type: 'error';
  error: string;
  completed: number;
  total: number;
}

export interface ICompleteEvent {
  type: 'complete';
  total: number;
  completed: number;
  /** Domains found unregistered, in completion order */
  unregistered: string[];
}

/**
 * One newline-delimited record of a streamed batch
 */
export type StreamEvent = IStartEvent | IResultEvent | IErrorEvent | ICompleteEvent;
