import { ComposeError } from '../../compose/utils/errors';

const describeCause = (cause: unknown): string => cause instanceof Error ? cause.message : `${cause}`;

export class OutputDirectoryError extends ComposeError {
  readonly cause: unknown;

  constructor(output_dir: string, cause: unknown) {
    super();
    this.name = 'output_directory_failed';
    this.message = `Failed to create output directory ${output_dir}: ${describeCause(cause)}`;
    this.cause = cause;
  }
}

export default class OutputWriteError extends ComposeError {
  readonly entity: string;
  readonly cause: unknown;

  constructor(entity: string, file_path: string, cause: unknown) {
    super();
    this.name = 'output_write_failed';
    this.message = `Failed to write ${entity} to ${file_path}: ${describeCause(cause)}`;
    this.entity = entity;
    this.cause = cause;
  }
}
