import { Command } from '@oclif/core';
import chalk from 'chalk';
import path from 'path';
import untildify from 'untildify';
import { prettyValidationErrors } from './common/compose/validation';
import type { ComposeSpec } from './compose/spec/compose-spec';
import { buildSpecFromPath } from './compose/spec/utils/compose-builder';
import { ValidationErrors } from './compose/utils/errors';

export default abstract class BaseCommand extends Command {
  protected loadCompose(compose_path: string): ComposeSpec {
    const spec = buildSpecFromPath(path.resolve(untildify(compose_path)));
    this.debug(`Loaded compose file ${spec.metadata.file?.path}`);
    for (const warning of spec.metadata.warnings) {
      this.warn(chalk.yellow(warning));
    }
    return spec;
  }

  async catch(error: Error & { exitCode?: number }): Promise<unknown> {
    if (error instanceof ValidationErrors) {
      prettyValidationErrors(error);
      this.exit(1);
    }
    return super.catch(error);
  }
}
