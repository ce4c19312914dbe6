export interface KubeEnvVar {
  name: string;
  value: string;
}

export interface KubeContainerPort {
  containerPort: number | string;
  hostPort?: number | string;
}

export interface KubeVolumeMount {
  name: string;
  mountPath: string;
}

export interface KubeSecurityContext {
  runAsUser?: number | string;
  runAsGroup?: number | string;
  privileged?: boolean;
}

export interface KubeContainer {
  name: string;
  image: string;
  command?: string[];
  args?: string[];
  env?: KubeEnvVar[];
  ports?: KubeContainerPort[];
  volumeMounts?: KubeVolumeMount[];
  workingDir?: string;
  securityContext?: KubeSecurityContext;
}

export interface KubeHostPathVolume {
  name: string;
  hostPath: {
    path: string;
    type: 'DirectoryOrCreate';
  };
}

export interface KubeClaimVolume {
  name: string;
  persistentVolumeClaim: {
    claimName: string;
  };
}

export type KubeVolume = KubeHostPathVolume | KubeClaimVolume;

export default interface KubePodTemplate {
  apiVersion: 'v1';
  kind: 'Pod';
  metadata: {
    name: string;
    labels: { [key: string]: string };
  };
  spec: {
    containers: KubeContainer[];
    volumes?: KubeVolume[];
    restartPolicy: 'Always';
  };
}
