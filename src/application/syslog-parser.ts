import type { RecordFields } from '../domain/index.js';

const FACILITIES = [
  'kern', 'user', 'mail', 'daemon', 'auth', 'syslog', 'lpr', 'news',
  'uucp', 'cron', 'authpriv', 'ftp', 'ntp', 'audit', 'alert', 'clock',
  'local0', 'local1', 'local2', 'local3', 'local4', 'local5', 'local6', 'local7',
] as const;

const SEVERITIES = ['emerg', 'alert', 'crit', 'err', 'warning', 'notice', 'info', 'debug'] as const;

// <PRI>VERSION TIMESTAMP HOSTNAME APP-NAME PROCID MSGID REST
const HEADER = /^<(\d{1,3})>([1-9]\d?) (\S+) (\S+) (\S+) (\S+) (\S+) ?(.*)$/s;

const NIL = '-';
const BOM = '\uFEFF';

/**
 * Parses one RFC 5424 syslog line into record fields.
 *
 * NILVALUE (`-`) header fields are left out. Structured data is skipped;
 * the free-form message becomes `msg` (a leading BOM is dropped).
 *
 * Returns `undefined` for anything that is not RFC 5424, leaving the
 * caller to decide how to route it.
 */
export function parseSyslogLine(line: string): RecordFields | undefined {
  const header = HEADER.exec(line);
  if (header === null) return undefined;

  const pri = Number(header[1]);
  if (pri > 191) return undefined;

  const rest = header[8] ?? '';
  const sdEnd = structuredDataEnd(rest);
  if (sdEnd === -1) return undefined;

  let msg: string;
  if (sdEnd === rest.length) {
    msg = '';
  } else if (rest[sdEnd] === ' ') {
    msg = rest.slice(sdEnd + 1);
    if (msg.startsWith(BOM)) msg = msg.slice(BOM.length);
  } else {
    return undefined;
  }

  return {
    msg,
    facility: FACILITIES[pri >> 3],
    severity: SEVERITIES[pri & 7],
    timestamp: nonNil(header[3]),
    hostname: nonNil(header[4]),
    appname: nonNil(header[5]),
    procid: nonNil(header[6]),
    msgid: nonNil(header[7]),
  };
}

function nonNil(value: string | undefined): string | undefined {
  return value === undefined || value === NIL ? undefined : value;
}

/**
 * Offset just past the STRUCTURED-DATA element(s) at the start of `text`,
 * or -1 when it is malformed. Handles `\"`, `\\` and `\]` escapes inside
 * quoted parameter values.
 */
function structuredDataEnd(text: string): number {
  if (text.startsWith(NIL)) return 1;
  if (!text.startsWith('[')) return -1;

  let i = 0;
  while (text[i] === '[') {
    i++;
    let quoted = false;
    while (i < text.length) {
      const ch = text[i];
      if (quoted) {
        if (ch === '\\') i++;
        else if (ch === '"') quoted = false;
      } else if (ch === '"') {
        quoted = true;
      } else if (ch === ']') {
        break;
      }
      i++;
    }
    if (i >= text.length) return -1;
    i++; // closing bracket
  }
  return i;
}
