import 'reflect-metadata';
import { Exclude, Transform } from 'class-transformer';
import { Allow, IsArray, IsBoolean, IsObject, IsOptional, IsString } from 'class-validator';
import type { ComposeFile } from '../utils/errors';
import type { Dictionary } from '../utils/dictionary';
import { ABSENT_FIELD } from './flexible-field';
import type { FlexibleField } from './flexible-field';
import { transformRestart, transformScalarToString } from './transform/common-transform';

export class ServiceSpec {
  @IsOptional()
  @IsString()
  image?: string;

  @IsOptional()
  @IsString()
  container_name?: string;

  @IsOptional()
  @IsString()
  @Transform(transformRestart, { toClassOnly: true })
  restart?: string;

  @IsOptional()
  @IsString()
  working_dir?: string;

  @IsOptional()
  @IsString()
  @Transform(transformScalarToString, { toClassOnly: true })
  user?: string;

  @IsOptional()
  @IsString()
  hostname?: string;

  @IsOptional()
  @IsBoolean()
  privileged?: boolean;

  @Allow()
  @Exclude()
  environment: FlexibleField = ABSENT_FIELD;

  @Allow()
  @Exclude()
  command: FlexibleField = ABSENT_FIELD;

  @Allow()
  @Exclude()
  entrypoint: FlexibleField = ABSENT_FIELD;

  @Allow()
  @Exclude()
  networks: FlexibleField = ABSENT_FIELD;

  @Allow()
  @Exclude()
  depends_on: FlexibleField = ABSENT_FIELD;

  @IsArray()
  @IsString({ each: true })
  @Exclude()
  ports: string[] = [];

  @IsArray()
  @IsString({ each: true })
  @Exclude()
  volumes: string[] = [];

  @IsObject()
  @Exclude()
  labels: Dictionary<string> = {};

  @IsArray()
  @IsString({ each: true })
  @Exclude()
  cap_add: string[] = [];

  @IsArray()
  @IsString({ each: true })
  @Exclude()
  cap_drop: string[] = [];
}

export class NetworkSpec {
  @IsOptional()
  @IsString()
  driver?: string;

  @IsOptional()
  @IsBoolean()
  external?: boolean;

  @IsObject()
  @Exclude()
  labels: Dictionary<string> = {};
}

export class VolumeSpec {
  @IsOptional()
  @IsString()
  driver?: string;

  @IsOptional()
  @IsBoolean()
  external?: boolean;

  @IsObject()
  @Exclude()
  labels: Dictionary<string> = {};
}

export interface ComposeMetadata {
  file?: ComposeFile;
  warnings: string[];
}

export class ComposeSpec {
  @IsOptional()
  @IsString()
  @Transform(transformScalarToString, { toClassOnly: true })
  version?: string;

  @IsOptional()
  @IsString()
  name?: string;

  @IsObject()
  @Exclude()
  services: Dictionary<ServiceSpec> = {};

  @IsObject()
  @Exclude()
  networks: Dictionary<NetworkSpec> = {};

  @IsObject()
  @Exclude()
  volumes: Dictionary<VolumeSpec> = {};

  metadata: ComposeMetadata = { warnings: [] };
}
