/**
 * Platform Types Module
 *
 * Platforms are WHERE the isolated runtime lives: a virtual environment on
 * the host (posix) or a container image (container).
 */

export type PlatformType = 'posix' | 'container';
