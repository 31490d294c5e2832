// Main entry point
export { ChainCapture } from './ChainCapture.js';
export type { ChainCaptureConfig } from './ChainCapture.js';

// Domain model
export type {
  ErrorPolicy,
  StopReason,
  FrameDiagnostic,
  CaptureProgress,
  CaptureFailure,
  CaptureSummary,
  PreviewResult,
} from './domain/model/Capture.js';
export type { RawFrame, ParsedFrame, FrameRecord, AcceptedFrame, RejectedFrame } from './domain/model/Frame.js';
export type {
  FrameValidationResult,
  FrameValidationError,
  FrameValidationErrorCode,
} from './domain/model/ValidationResult.js';
export type { SectionDefinition, SectionValueType, SectionColumns } from './domain/model/SectionDefinition.js';
export type { FaultNameTable, FaultNameOrigin } from './domain/model/FaultNameTable.js';
export { fallbackFaultTable, extractedFaultTable } from './domain/model/FaultNameTable.js';
export type { OutputSchema } from './domain/model/OutputSchema.js';
export type { CaptureRow, CaptureReport, DeviceReport, Range } from './domain/model/CaptureReport.js';
export {
  CELL_COUNT,
  FAULT_COUNT,
  FRAME_TERMINATOR,
  FIELD_DELIMITER,
  FRAME_INDEX_COLUMN,
  FRAME_SECTIONS,
  expectedValueCount,
} from './domain/model/FrameLayout.js';
export { CaptureStatus, canTransition, isTerminal } from './domain/model/CaptureStatus.js';
export { CaptureError, toErrorMessage } from './domain/model/CaptureError.js';
export type { FailureReason } from './domain/model/CaptureError.js';

// Use case result types
export type { CaptureStatusResult } from './application/usecases/GetCaptureStatus.js';

// Domain services (for building custom pipelines)
export { FrameAccumulator } from './domain/services/FrameAccumulator.js';
export { FrameValidator, tokenizeFrame, parseDecimal, parseInteger } from './domain/services/FrameValidator.js';
export { FaultNameResolver } from './domain/services/FaultNameResolver.js';
export { SchemaBuilder } from './domain/services/SchemaBuilder.js';
export { CaptureSummarizer, REQUIRED_REPORT_COLUMNS } from './domain/services/CaptureSummarizer.js';
export type { SummarizeOptions } from './domain/services/CaptureSummarizer.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RecordSink } from './domain/ports/RecordSink.js';
export type { FaultNameProvider } from './domain/ports/FaultNameProvider.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  CaptureStartedEvent,
  FaultsResolvedEvent,
  SchemaBuiltEvent,
  FrameAcceptedEvent,
  FrameRejectedEvent,
  CaptureProgressEvent,
  CaptureStoppedEvent,
  CaptureCompletedEvent,
  CaptureFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { SerialPortSource } from './infrastructure/sources/SerialPortSource.js';
export type {
  SerialPortSourceOptions,
  SerialPortLike,
  SerialPortOpenOptions,
} from './infrastructure/sources/SerialPortSource.js';
export { CsvFileSink } from './infrastructure/sinks/CsvFileSink.js';
export { InMemorySink } from './infrastructure/sinks/InMemorySink.js';
export { formatCell } from './infrastructure/sinks/formatCell.js';
export { FirmwareSourceFaultNames, extractFaultNames } from './infrastructure/faults/FirmwareSourceFaultNames.js';
export { CaptureCsvParser } from './infrastructure/parsers/CaptureCsvParser.js';
export type { CaptureTable } from './infrastructure/parsers/CaptureCsvParser.js';
