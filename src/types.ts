export type ChapterStage =
  | 'Pending'
  | 'TextResolved'
  | 'NarrationReady'
  | 'IllustrationReady'
  | 'Assembled';

export type ChapterState =
  | { state: Exclude<ChapterStage, 'Assembled'> }
  | { state: 'Assembled'; paths: ChapterArtifacts }
  | { state: 'Failed'; stage: ChapterStage; reason: string; error: string };

export interface Directories {
  input: string;
  output: string;
  audio: string;
  images: string;
}

export interface SpeechSettings {
  model: string;
  defaultVoice: string;
  quality: string;
}

export interface ImageSettings {
  model: string;
  size: string;
  quality: string;
  basePrompts: ReadonlyMap<number, string>;
}

export interface VideoSettings {
  fps: number;
  videoCodec: string;
  videoQuality: string;
  preset: string;
  audioCodec: string;
  audioBitrate: string;
  pixelFormat: string;
}

export interface Settings {
  root: string;
  directories: Directories;
  story: {
    chapterFilePattern: string;
    outputFilenamePattern: string;
    basePromptPattern?: string;
  };
  speech: SpeechSettings;
  image: ImageSettings;
  video: VideoSettings;
}

export interface ChapterPaths {
  chapter: number;
  input: string;
  audio: string;
  image: string;
  video: string;
  sceneImage(scene: number): string;
}

export interface ChapterArtifacts {
  audio: string;
  images: string[];
  video: string;
}

export interface SpeechSynthesizer {
  /** Longest text a single call accepts. Unset means no limit. */
  readonly maxCharacters?: number;
  synthesize(text: string, voice: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export interface ImageGenerator {
  generate(prompt: string, size: string, quality: string, signal?: AbortSignal): Promise<Uint8Array>;
}

/** Encoder settings shared by chapter and combined videos. */
export interface EncodeParams {
  outputPath: string;
  fps: number;
  videoCodec: string;
  videoQuality: string;
  preset: string;
  audioCodec: string;
  audioBitrate: string;
  pixelFormat: string;
}

export interface EncodeJob extends EncodeParams {
  audioPath: string;
  imagePaths: string[];
}

/** An audio file and the still shown while it plays. */
export interface MediaPair {
  stem: string;
  audioPath: string;
  imagePath: string;
}

/** Plays each pair in order, one still per audio file. */
export interface CombineJob extends EncodeParams {
  pairs: MediaPair[];
}

export interface EncodeResult {
  exitCode: number;
  stderr: string;
}

export interface MediaEncoder {
  encode(job: EncodeJob): Promise<EncodeResult>;
  combine(job: CombineJob): Promise<EncodeResult>;
}

/** Artifacts that can be regenerated on their own. */
export type ForceStage = 'narration' | 'illustration' | 'assembly';

export interface RunOptions {
  /** Regenerate every artifact. */
  force?: boolean;
  forceStages?: ForceStage[];
  /** Regenerate only these scenes' images. */
  forceScenes?: number[];
  voice?: string;
  scenes?: number[];
  signal?: AbortSignal;
}

export interface ChapterOutcome {
  chapter: number;
  state: ChapterState;
}

export interface BatchReport {
  succeeded: number[];
  failed: { chapter: number; stage: ChapterStage; reason: string }[];
  outcomes: ChapterOutcome[];
  exitCode: 0 | 1;
}
