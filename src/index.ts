export * from '../shared/app-state'
export * from '../shared/transcript'
export { AudioCapture, computeRmsLevel, type AudioCaptureOptions, type SampleBuffer } from './audio/audio-capture'
export type { AudioDevice, AudioDeviceOptions, AudioStreamHandle } from './audio/audio-device'
export { SoxAudioDevice } from './audio/sox-device'
export { createWavHeader, encodeWav } from './audio/wav'
export { AppController, type AppControllerOptions } from './core/app-controller'
export { ProcessingPipeline, type PipelineRun, type PipelineRunOptions, type TextCleaner } from './core/processing-pipeline'
export {
  SessionCoordinator,
  type CaptureControl,
  type PipelineRunner,
  type RecordingSession,
  type SessionCoordinatorOptions,
} from './core/session-coordinator'
export { AppleScriptTextInserter, ConsoleSink, createDeliverySink, type DeliverySink } from './delivery'
export { CleanupEngine, type CleanupResult } from './services/cleanup-engine'
export { formatTranscript } from './services/text-formatter'
export { KeyboardHookService, type KeyboardHook } from './services/keyboard-hook-service'
export { TranscriptStore } from './storage/transcript-store'
export { CommandTranscriber } from './transcriber/command-transcriber'
export { createTranscriber, type Transcriber, type TranscriptionResult } from './transcriber'
export * from './utils/errors'
