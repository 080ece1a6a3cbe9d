import type { Formatter, Post } from '../types.js';

const READ_MORE_PREFIX = '📖➡️';

function header(post: Post): string | null {
  if (post.is_repost && post.reposted_by) return `🔁 @${post.reposted_by} reposted @${post.author.username}:`;
  return null;
}

/**
 * Minimal formatter: the post text with the link to the original on its own
 * line, marked as a read-more link when the text is known to be truncated.
 * Platform-specific templates plug in through the Formatter interface.
 */
export const plainFormatter: Formatter = {
  format(post: Post): string {
    const parts: string[] = [];
    const head = header(post);
    if (head) parts.push(head);
    if (post.text.trim()) parts.push(post.text.trim());

    let text = parts.join('\n');
    if (post.quoted_post && !text.includes(post.quoted_post.url)) {
      text = `${text}\n\n💬 ${post.quoted_post.url}`;
    }
    if (post.url && !text.includes(post.url)) {
      const prefix = post.extensions.force_read_more ? `${READ_MORE_PREFIX} ` : '';
      text = `${text}\n\n${prefix}${post.url}`;
    }
    return text.trim();
  },
};
