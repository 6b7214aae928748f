/**
 * SMTP reply parsing.
 *
 * A reply is one or more lines. Continuation lines carry '-' in the 4th
 * position ("250-SIZE 52428800"); the final line carries a space
 * ("250 HELP"). A line shorter than 4 characters also ends the reply.
 */

export interface SmtpReply {
  /** Three-digit code from the first line ("" when the first line is shorter) */
  code: string;
  /** Raw lines without their CRLF */
  lines: string[];
  /** Lines joined with "\n", trimmed */
  text: string;
}

/**
 * Whether a line ends the reply it belongs to.
 */
export function isFinalReplyLine(line: string): boolean {
  return line.length < 4 || line.charAt(3) === ' ';
}

export function buildReply(lines: string[]): SmtpReply {
  const first = lines[0] ?? '';
  return {
    code: first.length >= 3 ? first.substring(0, 3) : '',
    lines,
    text: lines.join('\n').trim(),
  };
}

/**
 * Capability lines from an EHLO reply: every line after the first (which
 * only names the server), without the code and separator, e.g.
 * ["PIPELINING", "STARTTLS", "AUTH LOGIN PLAIN"].
 */
export function parseEhloCapabilities(reply: SmtpReply): string[] {
  if (reply.code !== '250') {
    return [];
  }
  return reply.lines
    .slice(1)
    .map((line) => line.substring(4).trim())
    .filter((line) => line.length > 0);
}

/**
 * Whether an EHLO capability keyword is present (case-insensitive).
 */
export function hasCapability(capabilities: string[], keyword: string): boolean {
  const wanted = keyword.toUpperCase();
  return capabilities.some((cap) => {
    const name = cap.split(/[\s=]/, 1)[0] ?? '';
    return name.toUpperCase() === wanted;
  });
}

/**
 * SASL mechanisms named by "AUTH LOGIN PLAIN" or the legacy "AUTH=LOGIN".
 */
export function getAuthMechanisms(capabilities: string[]): string[] {
  const mechanisms = new Set<string>();
  for (const cap of capabilities) {
    const match = /^AUTH[\s=](.*)$/i.exec(cap);
    if (!match) continue;
    for (const mechanism of (match[1] ?? '').split(/\s+/)) {
      if (mechanism) mechanisms.add(mechanism.toUpperCase());
    }
  }
  return [...mechanisms];
}
