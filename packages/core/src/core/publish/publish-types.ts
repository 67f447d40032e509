import type { CommandResult } from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';
import type { VersionIncrement } from '../version.js';

export interface PipelineOptions {
  output?: OutputPort;
  /** Base for relative paths in messages */
  cwd?: string;
}

export interface PublishOptions extends PipelineOptions {
  increment: VersionIncrement;
}

export interface PublishData {
  packageId: string;
  version: string;
  previousVersion: string;
}

export interface UploadData {
  packageId: string;
  remoteLocation: string;
}

export interface DownloadData {
  packageId: string;
  root: string;
  version: string;
  moduleCount: number;
}

export type PublishResult<T = PublishData> = CommandResult<T>;
