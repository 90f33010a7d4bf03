export { FfmpegScreenGrabber } from './capture/FfmpegScreenGrabber';
export type { FfmpegScreenGrabberOptions } from './capture/FfmpegScreenGrabber';
export { SharpFramePersister, qualityFromCompression } from './capture/SharpFramePersister';
export { BoundedChannel } from './recording/BoundedChannel';
export * from './recording/config';
export { createError, errorMessage } from './recording/errors';
export type { StatusError } from './recording/errors';
export { runFrameProducer } from './recording/FrameProducer';
export type { FrameProducerOptions } from './recording/FrameProducer';
export { artifactFileName, artifactIndex, runFrameSink } from './recording/FrameSink';
export type { FrameSinkOptions } from './recording/FrameSink';
export { GamepadPoller, GamepadRecorder } from './recording/GamepadRecorder';
export type { GamepadLogRecord } from './recording/GamepadRecorder';
export { canonicalKey, parseHotkey } from './recording/hotkey';
export { HotkeyStopRecorder } from './recording/HotkeyStopRecorder';
export { InputLogRecorder } from './recording/InputLogRecorder';
export type { InputLogRecord } from './recording/InputLogRecorder';
export { KeyboardRecorder } from './recording/KeyboardRecorder';
export type { KeyboardLogRecord } from './recording/KeyboardRecorder';
export { MouseRecorder } from './recording/MouseRecorder';
export type { MouseLogRecord } from './recording/MouseRecorder';
export { RecorderBase } from './recording/RecorderBase';
export { formatTimestamps, ScreenRecorder, TIMESTAMPS_FILE } from './recording/ScreenRecorder';
export type { ScreenRecorderOptions } from './recording/ScreenRecorder';
export { createSessionDirectory, SessionManager, sessionDirectoryName } from './recording/SessionManager';
export type { SessionManagerOptions, SessionReport, StopReason } from './recording/SessionManager';
export { StopFlag } from './recording/StopFlag';
export { summarizeScreenTelemetry, TelemetryAggregator } from './recording/TelemetryAggregator';
export type { ScreenTelemetry } from './recording/TelemetryAggregator';
export { TERMINATION_MARKER } from './recording/types';
export type {
  Availability,
  ChannelItem,
  Frame,
  FramePersister,
  GamepadEvent,
  GamepadSource,
  GrabTelemetry,
  HotkeyOutcome,
  InputHook,
  InputLogSummary,
  KeyInputEvent,
  Logger,
  MouseInputEvent,
  PersistRequest,
  PixelChannels,
  RawImage,
  Recorder,
  RecorderContext,
  RecorderOutcome,
  RecorderState,
  Region,
  SaveTelemetry,
  ScreenGrabber,
  ScreenReport,
  TelemetryRecord,
  TerminationMarker,
} from './recording/types';
export { evaluateTrial, nextTargetFps, suggestRecordingConfig } from './tuning/suggestRecordingConfig';
export type { TuningOptions, TuningResult, TuningTrial } from './tuning/suggestRecordingConfig';
