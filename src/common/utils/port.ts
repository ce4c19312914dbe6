export interface PortMapping {
  container_port: string;
  /** Host side of the mapping, `ip:port` when an address is bound, empty when unpublished */
  host_port: string;
}

/**
 * Splits a compose short-syntax port (`container`, `host:container` or `ip:host:container`).
 * Values are not range-checked; unrecognised shapes are treated as a bare container port.
 */
export const parsePort = (port: string): PortMapping => {
  const parts = port.split(':');
  switch (parts.length) {
    case 3:
      return { container_port: parts[2], host_port: `${parts[0]}:${parts[1]}` };
    case 2:
      return { container_port: parts[1], host_port: parts[0] };
    default:
      return { container_port: port, host_port: '' };
  }
};
