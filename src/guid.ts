import { randomBytes } from 'node:crypto';

/** Random lowercase hex string, used for the login unique id and notification key. */
export default (len = 32) =>
  randomBytes(Math.ceil(len / 2))
    .toString('hex')
    .slice(0, len);
