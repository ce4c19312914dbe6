import type { TransformFnParams } from 'class-transformer';
import { Dictionary, isDictionary } from '../../utils/dictionary';

const isScalar = (value: unknown): value is string | number | boolean => {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
};

export const transformScalarToString = ({ value }: TransformFnParams): unknown => {
  return typeof value === 'number' ? `${value}` : value;
};

export const transformRestart = ({ value }: TransformFnParams): unknown => {
  // restart: false means the same as restart: "no"
  return value === false ? 'no' : value;
};

const transformPort = (port: unknown): string | undefined => {
  if (typeof port === 'string') {
    return port;
  }
  if (typeof port === 'number') {
    return `${port}`;
  }
  if (isDictionary(port) && isScalar(port.target)) {
    let spec = `${port.target}`;
    if (isScalar(port.published)) {
      spec = `${port.published}:${spec}`;
      if (typeof port.host_ip === 'string' && port.host_ip) {
        spec = `${port.host_ip}:${spec}`;
      }
    }
    if (typeof port.protocol === 'string' && port.protocol) {
      spec += `/${port.protocol}`;
    }
    return spec;
  }
  return undefined;
};

export const transformNullableList = (value: unknown): unknown => {
  return value === null ? [] : value;
};

export const transformPorts = (value: unknown): unknown => {
  if (value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    return value;
  }
  const ports: string[] = [];
  for (const port of value) {
    const spec = transformPort(port);
    if (spec !== undefined) {
      ports.push(spec);
    }
  }
  return ports;
};

const transformVolume = (volume: unknown): string | undefined => {
  if (typeof volume === 'string') {
    return volume;
  }
  if (isDictionary(volume) && typeof volume.target === 'string') {
    if (typeof volume.source !== 'string' || !volume.source) {
      return volume.target;
    }
    return `${volume.source}:${volume.target}${volume.read_only === true ? ':ro' : ''}`;
  }
  return undefined;
};

export const transformVolumes = (value: unknown): unknown => {
  if (value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    return value;
  }
  const volumes: string[] = [];
  for (const volume of value) {
    const spec = transformVolume(volume);
    if (spec !== undefined) {
      volumes.push(spec);
    }
  }
  return volumes;
};

export const transformLabels = (value: unknown): unknown => {
  if (value === null) {
    return {};
  }
  const labels: Dictionary<string> = {};
  if (Array.isArray(value)) {
    for (const item of value) {
      if (typeof item !== 'string') {
        continue;
      }
      const index = item.indexOf('=');
      if (index > 0) {
        labels[item.substring(0, index)] = item.substring(index + 1);
      }
    }
    return labels;
  }
  if (isDictionary(value)) {
    for (const [key, label] of Object.entries(value)) {
      if (isScalar(label)) {
        labels[key] = `${label}`;
      }
    }
    return labels;
  }
  return value;
};
