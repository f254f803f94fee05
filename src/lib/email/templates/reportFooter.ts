/**
 * Shared footer for every report email. Always the final block of a body.
 */

export function reportFooter(sender: string, disclaimer: string): string {
  return [
    `For questions about this report, please reply to this message or e-mail ${sender}.`,
    `DISCLAIMER: ${disclaimer}`,
  ].join('\n');
}

/**
 * Join non-empty body blocks with a blank line and finish with the footer
 */
export function withFooter(blocks: Array<string | undefined>, footer: string): string {
  return [...blocks.filter((block): block is string => Boolean(block)), footer].join('\n\n');
}
