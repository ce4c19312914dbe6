import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';
import untildify from 'untildify';
import BaseCommand from '../base-command';
import { DEFAULT_POD_NAME, KubeGenerator } from '../common/kube/generator';

export default class Kube extends BaseCommand {
  static description = 'Generate a pod manifest for `podman play kube` from a compose file';

  static examples = [
    'compose-podman kube',
    'compose-podman kube ./docker-compose.yml --pod-name my-app -o pod.yaml',
  ];

  static flags = {
    output: Flags.string({
      char: 'o',
      description: 'Path the manifest is written to. The manifest is printed to stdout when omitted.',
    }),
    'pod-name': Flags.string({
      char: 'n',
      description: `Name of the generated pod. Defaults to the compose project name, then to ${DEFAULT_POD_NAME}.`,
    }),
  };

  static args = {
    compose_file: Args.string({
      description: 'Path to a compose file or a directory containing one',
      default: '.',
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Kube);

    const compose = this.loadCompose(args.compose_file);
    const generator = new KubeGenerator(compose, { pod_name: flags['pod-name'] || compose.name });
    const manifest = generator.generate();

    if (!flags.output) {
      this.log(manifest.trimEnd());
      return;
    }

    const output_path = path.resolve(untildify(flags.output));
    fs.outputFileSync(output_path, manifest);
    this.log(chalk.green(`Wrote pod ${generator.pod_name} to ${output_path}`));
  }
}
