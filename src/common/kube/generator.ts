import yaml from 'js-yaml';
import type { ComposeSpec, ServiceSpec } from '../../compose/spec/compose-spec';
import { commandList, containerName, entrypointList, environmentMap } from '../../compose/spec/transform/service-transform';
import { sortedEntries } from '../../compose/utils/dictionary';
import MissingRequiredFieldError from '../errors/missing-required-field';
import { parsePort } from '../utils/port';
import { parseUser } from '../utils/user';
import { parseVolume } from '../utils/volume';
import type KubePodTemplate from './template';
import type { KubeContainer, KubeSecurityContext, KubeVolume } from './template';

export const DEFAULT_POD_NAME = 'compose-pod';
export const POD_APP_LABEL = 'compose-podman';

export interface KubeGeneratorOptions {
  /** Falls back to DEFAULT_POD_NAME when blank */
  pod_name?: string;
}

interface VolumeInfo {
  name: string;
  host_path: string;
  is_path: boolean;
}

// Digit strings beyond Number.MAX_SAFE_INTEGER stay strings
export const toNumberOrString = (value: string): number | string => {
  if (!/^\d+$/.test(value)) {
    return value;
  }
  const number = parseInt(value, 10);
  return Number.isSafeInteger(number) ? number : value;
};

export class KubeGenerator {
  private readonly compose: ComposeSpec;
  readonly pod_name: string;

  constructor(compose: ComposeSpec, options: KubeGeneratorOptions = {}) {
    this.compose = compose;
    this.pod_name = options.pod_name?.trim() || DEFAULT_POD_NAME;
  }

  buildPod(): KubePodTemplate {
    // Keyed by canonical name, the first mount seen for a name decides its type
    const used_volumes = new Map<string, VolumeInfo>();

    const containers: KubeContainer[] = [];
    for (const [service_name, service] of sortedEntries(this.compose.services)) {
      containers.push(this.buildContainer(service_name, service, used_volumes));
    }

    const volumes: KubeVolume[] = [];
    for (const volume of used_volumes.values()) {
      if (volume.is_path) {
        volumes.push({
          name: volume.name,
          hostPath: { path: volume.host_path, type: 'DirectoryOrCreate' },
        });
      } else {
        volumes.push({
          name: volume.name,
          persistentVolumeClaim: { claimName: volume.name },
        });
      }
    }

    return {
      apiVersion: 'v1',
      kind: 'Pod',
      metadata: {
        name: this.pod_name,
        labels: { app: POD_APP_LABEL },
      },
      spec: {
        containers,
        ...(volumes.length ? { volumes } : {}),
        restartPolicy: 'Always',
      },
    };
  }

  generate(): string {
    return yaml.dump(this.buildPod(), { lineWidth: -1, noRefs: true });
  }

  private buildContainer(service_name: string, service: ServiceSpec, used_volumes: Map<string, VolumeInfo>): KubeContainer {
    if (!service.image) {
      throw new MissingRequiredFieldError(service_name, 'image', 'build not supported');
    }

    const container: KubeContainer = {
      name: containerName(service_name, service),
      image: service.image,
    };

    // Kubernetes `command` replaces the image entrypoint, `args` replaces its cmd
    const entrypoint = entrypointList(service);
    if (entrypoint.length) {
      container.command = entrypoint;
    }
    const command = commandList(service);
    if (command.length) {
      container.args = command;
    }

    const environment = Object.entries(environmentMap(service));
    if (environment.length) {
      container.env = environment.map(([name, value]) => ({ name, value }));
    }

    if (service.ports.length) {
      container.ports = service.ports.map((port) => {
        const { container_port, host_port } = parsePort(port);
        return host_port ?
          { containerPort: toNumberOrString(container_port), hostPort: toNumberOrString(host_port) } :
          { containerPort: toNumberOrString(container_port) };
      });
    }

    if (service.volumes.length) {
      container.volumeMounts = service.volumes.map((volume) => {
        const { mount_path, name, host_path, is_path } = parseVolume(volume);
        if (!used_volumes.has(name)) {
          used_volumes.set(name, { name, host_path, is_path });
        }
        return { name, mountPath: mount_path };
      });
    }

    if (service.working_dir) {
      container.workingDir = service.working_dir;
    }

    if (service.user || service.privileged) {
      const security_context: KubeSecurityContext = {};
      if (service.user) {
        const { uid, gid } = parseUser(service.user);
        if (uid) {
          security_context.runAsUser = toNumberOrString(uid);
        }
        if (gid) {
          security_context.runAsGroup = toNumberOrString(gid);
        }
      }
      if (service.privileged) {
        security_context.privileged = true;
      }
      container.securityContext = security_context;
    }

    return container;
  }
}
