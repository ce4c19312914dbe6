import path from 'path';
import type { ComposeSpec, NetworkSpec, ServiceSpec, VolumeSpec } from '../../compose/spec/compose-spec';
import type { FlexibleField } from '../../compose/spec/flexible-field';
import { commandList, containerName, dependsOnList, entrypointList, environmentMap, networksList, transformArgumentList } from '../../compose/spec/transform/service-transform';
import { sortedEntries } from '../../compose/utils/dictionary';
import OutputWriteError, { OutputDirectoryError } from '../errors/output-write';
import { formatUnitFile, fromRecord, fromValues } from './unit-file';
import type { UnitEntry, UnitSection } from './unit-file';
import { FsUnitFileWriter } from './writer';
import type { UnitFileWriter } from './writer';

export const DEFAULT_QUADLET_DIR = 'quadlet';
export const QUADLET_TIMEOUT_START_SEC = 900;
export const DEFAULT_RESTART_POLICY = 'always';

const RESTART_POLICIES = new Map<string, string>([
  ['no', 'no'],
  ['always', 'always'],
  ['on-failure', 'on-failure'],
  ['unless-stopped', 'always'],
]);

export const toSystemdRestart = (restart?: string): string => {
  return (restart && RESTART_POLICIES.get(restart)) || DEFAULT_RESTART_POLICY;
};

export const toServiceUnitName = (service_name: string): string => `${service_name}.service`;

/**
 * Quotes a value for a directive that systemd splits on whitespace. Values without whitespace,
 * quotes or backslashes are written as they are.
 */
export const quoteUnitValue = (value: string): string => {
  if (value && !/[\s"'\\]/.test(value)) {
    return value;
  }
  return `"${value.replace(/[\\"]/g, '\\$&')}"`;
};

/**
 * A command written as a single string is passed through for systemd to split. A list keeps its
 * argument boundaries through quoting.
 */
export const formatCommandLine = (field: FlexibleField): string => {
  const args = transformArgumentList(field);
  return field.kind === 'sequence' ? args.map(quoteUnitValue).join(' ') : args.join(' ');
};

const INSTALL_SECTION: UnitSection = { name: 'Install', entries: [['WantedBy', 'default.target']] };

export class QuadletGenerator {
  private readonly compose: ComposeSpec;
  private readonly output_dir: string;
  private readonly writer: UnitFileWriter;

  constructor(compose: ComposeSpec, output_dir: string, writer: UnitFileWriter = new FsUnitFileWriter()) {
    this.compose = compose;
    this.output_dir = output_dir;
    this.writer = writer;
  }

  /**
   * Writes one unit file per network, volume and service. The first failed write aborts the run.
   * @returns the paths written, in order
   */
  generate(): string[] {
    try {
      this.writer.ensureDir(this.output_dir);
    } catch (err) {
      throw new OutputDirectoryError(this.output_dir, err);
    }

    const written: string[] = [];
    for (const [name, network] of sortedEntries(this.compose.networks)) {
      written.push(this.write(`${name}.network`, `network ${name}`, this.buildNetwork(name, network)));
    }
    for (const [name, volume] of sortedEntries(this.compose.volumes)) {
      written.push(this.write(`${name}.volume`, `volume ${name}`, this.buildVolume(name, volume)));
    }
    for (const [name, service] of sortedEntries(this.compose.services)) {
      written.push(this.write(`${name}.container`, `container ${name}`, this.buildContainer(name, service)));
    }
    return written;
  }

  buildNetwork(name: string, network: NetworkSpec): string {
    const entries: UnitEntry[] = [];
    if (network.driver) {
      entries.push(['Driver', network.driver]);
    }
    entries.push(...fromRecord('Label', network.labels, quoteUnitValue));

    return formatUnitFile([
      { name: 'Unit', entries: [['Description', `${name} network`]] },
      { name: 'Network', entries },
      INSTALL_SECTION,
    ]);
  }

  buildVolume(name: string, volume: VolumeSpec): string {
    const entries: UnitEntry[] = [];
    if (volume.driver && volume.driver !== 'local') {
      entries.push(['Driver', volume.driver]);
    }
    entries.push(...fromRecord('Label', volume.labels, quoteUnitValue));

    return formatUnitFile([
      { name: 'Unit', entries: [['Description', `${name} volume`]] },
      { name: 'Volume', entries },
      INSTALL_SECTION,
    ]);
  }

  buildContainer(name: string, service: ServiceSpec): string {
    const unit: UnitEntry[] = [['Description', `${name} container`]];
    const dependencies = dependsOnList(service).map(toServiceUnitName);
    if (dependencies.length) {
      unit.push(['After', dependencies.join(' ')]);
      unit.push(['Requires', dependencies.join(' ')]);
    }

    const container: UnitEntry[] = [];
    if (service.image) {
      container.push(['Image', service.image]);
    }
    container.push(['ContainerName', containerName(name, service)]);
    container.push(...fromRecord('Environment', environmentMap(service), quoteUnitValue));
    container.push(...fromValues('PublishPort', service.ports));
    container.push(...fromValues('Volume', service.volumes));
    container.push(...fromValues('Network', networksList(service).map((network) => `${network}.network`)));
    if (service.working_dir) {
      container.push(['WorkingDir', service.working_dir]);
    }
    if (service.user) {
      container.push(['User', service.user]);
    }
    if (commandList(service).length) {
      container.push(['Exec', formatCommandLine(service.command)]);
    }
    if (entrypointList(service).length) {
      container.push(['Entrypoint', formatCommandLine(service.entrypoint)]);
    }
    if (service.hostname) {
      container.push(['HostName', service.hostname]);
    }
    if (service.privileged) {
      container.push(['SecurityLabelDisable', 'true']);
    }
    container.push(...fromValues('AddCapability', service.cap_add));
    container.push(...fromValues('DropCapability', service.cap_drop));
    container.push(...fromRecord('Label', service.labels, quoteUnitValue));

    return formatUnitFile([
      { name: 'Unit', entries: unit },
      { name: 'Container', entries: container },
      {
        name: 'Service',
        entries: [
          ['Restart', toSystemdRestart(service.restart)],
          ['TimeoutStartSec', `${QUADLET_TIMEOUT_START_SEC}`],
        ],
      },
      INSTALL_SECTION,
    ]);
  }

  private write(file_name: string, entity: string, contents: string): string {
    const file_path = path.join(this.output_dir, file_name);
    try {
      this.writer.writeFile(file_path, contents);
    } catch (err) {
      throw new OutputWriteError(entity, file_path, err);
    }
    return file_path;
  }
}
