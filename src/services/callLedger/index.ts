export { CallLedger, type CallLedgerOptions } from './CallLedger.js';
export { FileAppendLog, type FileAppendLogConfig } from './FileAppendLog.js';
export { InMemoryAppendLog } from './InMemoryAppendLog.js';
export { summarizeCalls, isRateLimitRecord } from './callStats.js';
export { CallRecordSchema, type AppendLog, type CallRecord, type CallStats } from './types.js';
