// Types
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  isOk,
  isErr,
  collectResults,
  unwrap,
} from './types/result.ts';

// Errors
export {
  AppError,
  AppErrorSchema,
  SEVERITY,
  toError,
  type Severity,
  type AppErrorDTO,
} from './errors/app-error.ts';

// Periods
export {
  MONTH_NAMES,
  comparePeriods,
  createPeriod,
  formatPeriodRange,
  monthName,
  parseMonthLabel,
  type MonthName,
  type Period,
} from './periods/months.ts';

// DTOs
export {
  PeriodSchema,
  MetricObservationSchema,
  type MetricObservation,
  TableSummarySchema,
  type TableSummary,
  MetricStatisticsSchema,
  type MetricStatistics,
  PreparedDatasetDTOSchema,
  type PreparedDatasetDTO,
} from './dto/dataset.ts';

export { TABLE_NAMES, type TableName } from './dto/tables.ts';

// API contracts
export {
  type ApiResult,
  type ApiOk,
  type ApiErr,
  ApiResultSchema,
  PreparedDatasetResultSchema,
  type PreparedDatasetResult,
  API_ROUTES,
  type ApiRoute,
} from './api/contracts.ts';

// Logger
export {
  createLogger,
  createJsonWriter,
  createTextWriter,
  formatTextEntry,
  isLogLevelEnabled,
  LOG_LEVELS,
  LOG_FORMATS,
  type Logger,
  type LogEntry,
  type LogFormat,
  type LogLevel,
  type LogContext,
  type LogSink,
  type LogWriter,
  type Clock,
  type CreateLoggerOptions,
} from './logger/index.ts';
