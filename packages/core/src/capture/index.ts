// packages/core/src/capture/index.ts -- barrel re-export

export { CommandCapture } from './capture.js';
export type { CaptureResult, SnapshotCapture } from './capture.js';
