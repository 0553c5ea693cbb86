/**
 * Value paths used in failure messages: `$`, `$.user.tags[]`
 */

export const ROOT_PATH = "$";

const SIMPLE_KEY = /^[A-Za-z_$][\w$]*$/;

export function fieldPath(parent: string, key: string): string {
  return SIMPLE_KEY.test(key) ? `${parent}.${key}` : `${parent}[${JSON.stringify(key)}]`;
}

export function itemPath(parent: string): string {
  return `${parent}[]`;
}
