import { ComposeError } from '../../compose/utils/errors';

export default class MissingComposeFileError extends ComposeError {
  constructor(spec_path: string) {
    super();
    this.name = 'missing_compose_file';
    this.message = `Could not find a compose file at ${spec_path}. Pass a path to a compose file or a directory containing one.`;
  }
}
