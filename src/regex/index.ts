/**
 * Centralized regex handling for user-provided patterns.
 *
 * All patterns typed by the user go through UserRegex, which matches with
 * RE2 in linear time.
 *
 * Usage:
 *   import { createUserRegex } from '../regex/index.js';
 *
 *   const regex = createUserRegex(userPattern, { ignoreCase: true });
 *   for (const [start, end] of regex.spans(line)) { ... }
 */

export {
  createUserRegex,
  type Span,
  UserRegex,
  type UserRegexOptions,
} from "./user-regex.js";
