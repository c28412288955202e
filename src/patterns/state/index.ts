export { StreamingResponder } from './StreamingResponder';
export { StreamStateType, STREAM_TRANSITIONS } from './IStreamState';
export type { IStreamChannel, IStreamOutcome, WriteOutcome, AbortReason } from './IStreamState';
