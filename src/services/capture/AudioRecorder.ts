import type { MeterSample, RecordedAudio } from '../../types';

export interface RecordingStartOptions {
  onMeterSample: (sample: MeterSample) => void;
}

export interface AudioCapture {
  isRecording(): boolean;
  requestPermission(): Promise<boolean>;
  /** Starts capture and resolves with the path the recording is written to. */
  startRecording(options: RecordingStartOptions): Promise<string>;
  stopRecording(): Promise<RecordedAudio>;
}
