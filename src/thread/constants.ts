/**
 * Outline-chat document format constants.
 *
 * Thread files are Org-style outlines: `*` headings, optional `:PROPERTIES:`
 * drawers and `#+begin_src` blocks for quoted code.
 */

/**
 * Prefix of every thread file name. The rest is a full-precision UTC timestamp.
 *
 * Example: `chat-20261019T141503123.org`
 */
export const THREAD_FILE_PREFIX = 'chat-';

export const THREAD_FILE_EXTENSION = '.org';

/**
 * Default directory (relative to `rootDir`) where thread files live.
 */
export const DEFAULT_THREADS_DIR = '.outline-chat';

/**
 * Optional JSON configuration file looked up in `rootDir`.
 */
export const DEFAULT_CONFIG_FILE = 'outline-chat.json';

export const DEFAULT_USER_NAME = 'User';
export const DEFAULT_AI_NAME = 'AI';
export const DEFAULT_PROMPT_PREAMBLE = 'You are a helpful assistant.';

/**
 * Keywords that may precede a heading title and are not part of it.
 */
export const HEADING_KEYWORDS = ['TODO', 'DONE', 'COMMENT'] as const;

export const PROPERTIES_START_RE = /^\s*:PROPERTIES:\s*$/;
export const PROPERTIES_END_RE = /^\s*:END:\s*$/;
