import { ComposeError } from '../../compose/utils/errors';

export default class MissingRequiredFieldError extends ComposeError {
  readonly service_name: string;
  readonly field: string;

  constructor(service_name: string, field: string, reason?: string) {
    super();
    this.name = 'missing_required_field';
    this.message = `service ${service_name}: ${field} is required${reason ? ` (${reason})` : ''}`;
    this.service_name = service_name;
    this.field = field;
  }
}
