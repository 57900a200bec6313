import { randomInt } from 'node:crypto';

export const LOWERCASE_LETTERS = 'abcdefghijklmnopqrstuvwxyz';
export const LOWERCASE_ALPHANUMERIC = `${LOWERCASE_LETTERS}0123456789`;

export type RandomIndex = (max: number) => number;

/** `length` characters drawn from `alphabet`. */
export function randomString(length: number, alphabet = LOWERCASE_ALPHANUMERIC, pick: RandomIndex = randomInt): string {
  let value = '';
  for (let i = 0; i < length; i++) value += alphabet.charAt(pick(alphabet.length));
  return value;
}
