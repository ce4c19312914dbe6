import chalk from 'chalk';
import BaseCommand from '../base-command';
import { validateImages } from '../compose/spec/utils/spec-validator';
import { ValidationErrors } from '../compose/utils/errors';

export default class Validate extends BaseCommand {
  static description = 'Validate that one or more compose files can be converted';

  static strict = false;

  static examples = [
    'compose-podman validate',
    'compose-podman validate ./docker-compose.yml ../other/compose.yaml',
  ];

  async run(): Promise<void> {
    const { argv } = await this.parse(Validate);
    const compose_paths = argv.length ? argv.map((arg) => `${arg}`) : ['.'];

    for (const compose_path of compose_paths) {
      const compose = this.loadCompose(compose_path);
      const errors = validateImages(compose);
      if (errors.length) {
        throw new ValidationErrors(errors, compose.metadata.file);
      }

      const service_count = Object.keys(compose.services).length;
      this.log(chalk.green(`✅ ${compose.metadata.file?.path}: ${service_count} service${service_count === 1 ? '' : 's'}`));
    }
  }
}
