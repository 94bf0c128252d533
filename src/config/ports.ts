export const PORT_RANGE = {
  END: 8200,
  START: 8080,
} as const;

export const EXPLICIT_PORT_LIMITS = {
  MAX: 65_535,
  MIN: 1024,
} as const;

/** phpMyAdmin is published this far above the WordPress port. */
export const ADMIN_PORT_OFFSET = 100;

export const CONTAINER_PORTS = {
  HTTP: 80,
  MYSQL: 3306,
} as const;

export type ContainerPort = (typeof CONTAINER_PORTS)[keyof typeof CONTAINER_PORTS];
