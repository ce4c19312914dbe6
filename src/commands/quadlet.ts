import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import path from 'path';
import untildify from 'untildify';
import BaseCommand from '../base-command';
import { DEFAULT_QUADLET_DIR, QuadletGenerator } from '../common/quadlet/generator';

export default class Quadlet extends BaseCommand {
  static description = 'Generate Podman Quadlet unit files (.container, .volume, .network) from a compose file';

  static examples = [
    'compose-podman quadlet',
    'compose-podman quadlet ./docker-compose.yml -o ~/.config/containers/systemd',
  ];

  static flags = {
    output: Flags.string({
      char: 'o',
      description: 'Directory the unit files are written to. Created when missing.',
      default: DEFAULT_QUADLET_DIR,
    }),
  };

  static args = {
    compose_file: Args.string({
      description: 'Path to a compose file or a directory containing one',
      default: '.',
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Quadlet);

    const compose = this.loadCompose(args.compose_file);
    const output_dir = path.resolve(untildify(flags.output));
    const written = new QuadletGenerator(compose, output_dir).generate();

    for (const file_path of written) {
      this.log(chalk.green(`Wrote ${file_path}`));
    }
    this.log(chalk.blue(`Run \`systemctl --user daemon-reload\` to load the ${written.length} generated units.`));
  }
}
