import path from 'path';

export const ANONYMOUS_VOLUME_NAME = 'unnamed-vol';
export const FALLBACK_VOLUME_NAME = 'volume';
export const VOLUME_NAME_PREFIX = 'vol-';
export const MAX_VOLUME_NAME_LENGTH = 63;

export interface VolumeMount {
  mount_path: string;
  /** Canonical name used to reference the volume from the pod spec */
  name: string;
  /** Host directory for bind mounts, empty for named and anonymous volumes */
  host_path: string;
  is_path: boolean;
}

const isDriveLetterPath = (spec: string): boolean => {
  return spec.length >= 3 && spec[1] === ':' && (spec[2] === '/' || spec[2] === '\\');
};

const anonymousVolume = (spec: string): VolumeMount => {
  return { mount_path: spec, name: ANONYMOUS_VOLUME_NAME, host_path: '', is_path: false };
};

/**
 * Any source containing a separator counts as a host path, so `data/cache` is a bind mount even
 * without a leading `./`.
 */
export const isHostPath = (source: string): boolean => {
  if (source.startsWith('/')) {
    return true;
  }
  if (source.startsWith('./') || source.startsWith('../')) {
    return true;
  }
  if (source.length >= 2 && source[1] === ':') {
    return true;
  }
  return source.includes('/') || source.includes('\\');
};

export const pathToVolumeName = (host_path: string): string => {
  let name = path.posix.normalize(host_path)
    .replace(/[:/\\._]/g, '-')
    .toLowerCase()
    .replace(/^-+|-+$/g, '');

  if (/^[-0-9]/.test(name)) {
    name = `${VOLUME_NAME_PREFIX}${name}`;
  }

  if (name.length > MAX_VOLUME_NAME_LENGTH) {
    name = name.substring(0, MAX_VOLUME_NAME_LENGTH).replace(/-+$/, '');
  }

  return name || FALLBACK_VOLUME_NAME;
};

/**
 * Parses `source:target[:options]`. Options are ignored. A drive-letter source such as `C:/data`
 * keeps its colon, the target starts after the next one.
 */
export const parseVolume = (spec: string): VolumeMount => {
  let source: string;
  let mount_path: string;

  if (isDriveLetterPath(spec)) {
    const index = spec.indexOf(':', 3);
    if (index === -1) {
      return anonymousVolume(spec);
    }
    source = spec.substring(0, index);
    mount_path = spec.substring(index + 1).split(':')[0];
  } else {
    const parts = spec.split(':');
    if (parts.length < 2) {
      return anonymousVolume(spec);
    }
    source = parts[0];
    mount_path = parts[1];
  }

  if (isHostPath(source)) {
    return { mount_path, name: pathToVolumeName(source), host_path: source, is_path: true };
  }
  return { mount_path, name: source, host_path: '', is_path: false };
};
