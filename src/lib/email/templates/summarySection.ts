/**
 * Summary section renderers.
 *
 * `grouped` splits fragments by a case-insensitive token found in their label
 * (DIPS / SIPS) and renders one headed section per group, optionally followed
 * by the attachment filenames carrying the same token. `flat` lists every
 * fragment as its own delimited block.
 */

import type { BodyLayout, FragmentGroup } from '../../../config/reportConfig';
import type { Attachment, SummaryFragment } from '../../../types/report';

export const BLOCK_SEPARATOR = '='.repeat(30);

export const containsToken = (value: string, token: string): boolean =>
  value.toLowerCase().includes(token.toLowerCase());

function renderGroup(
  group: FragmentGroup,
  fragments: SummaryFragment[],
  attachments: Attachment[] | null
): string {
  const text = fragments
    .filter((fragment) => containsToken(fragment.label, group.token))
    .map((fragment) => fragment.content)
    .join('\n\n');

  const lines = [
    group.heading,
    '',
    text || `(No ${group.token} summary report content found for this week.)`,
  ];

  if (attachments) {
    const names = attachments
      .map((attachment) => attachment.filename)
      .filter((filename) => containsToken(filename, group.token))
      .sort();
    lines.push(
      `Attached CSV files: ${names.length > 0 ? names.join(', ') : `(No ${group.token} CSV attachments found.)`}`
    );
  }

  return lines.join('\n');
}

function renderFlat(fragments: SummaryFragment[]): string {
  const blocks = fragments.map((fragment) =>
    [`SUMMARY TXT: ${fragment.label}`, BLOCK_SEPARATOR, fragment.content, BLOCK_SEPARATOR].join('\n')
  );
  return `SUMMARY REPORTS:\n${blocks.join('\n\n')}`;
}

/**
 * Render the summary section, or an empty string when there are no fragments.
 * Fragment order is preserved exactly as collected.
 *
 * @param attachments pass null to omit attachment listings (no-data emails)
 */
export function renderSummarySection(
  layout: BodyLayout,
  groups: FragmentGroup[],
  fragments: SummaryFragment[],
  attachments: Attachment[] | null
): string {
  if (fragments.length === 0) {
    return '';
  }
  if (layout === 'flat') {
    return renderFlat(fragments);
  }
  return groups.map((group) => renderGroup(group, fragments, attachments)).join('\n\n');
}
