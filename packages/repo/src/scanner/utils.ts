export const DEFAULT_IGNORES = ['node_modules'];

export const GIT_DIR = '.git';
export const GIT_CONFIG = 'config';
export const MODULES_DIR = 'modules';
export const GITMODULES = '.gitmodules';

export function isHidden(name: string): boolean {
  return name.startsWith('.');
}
