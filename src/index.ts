import 'reflect-metadata';

export * from './common/kube/generator';
export type { default as KubePodTemplate, KubeClaimVolume, KubeContainer, KubeContainerPort, KubeEnvVar, KubeHostPathVolume, KubeSecurityContext, KubeVolume, KubeVolumeMount } from './common/kube/template';
export * from './common/quadlet/generator';
export * from './common/quadlet/unit-file';
export * from './common/quadlet/writer';
export * from './common/utils/port';
export * from './common/utils/user';
export * from './common/utils/volume';
export { default as MissingComposeFileError } from './common/errors/missing-compose-file';
export { default as MissingRequiredFieldError } from './common/errors/missing-required-field';
export { default as OutputWriteError, OutputDirectoryError } from './common/errors/output-write';
export * from './compose/spec/compose-spec';
export * from './compose/spec/flexible-field';
export * from './compose/spec/transform/compose-transform';
export * from './compose/spec/transform/service-transform';
export * from './compose/spec/utils/compose-builder';
export * from './compose/spec/utils/spec-validator';
export * from './compose/utils/dictionary';
export * from './compose/utils/errors';
