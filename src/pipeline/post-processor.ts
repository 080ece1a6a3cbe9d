import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { EditCheckResult, EditDetector } from '../processors/edit-detector.js';
import { createUrlProcessor, type UrlProcessor } from '../processors/url-processor.js';
import { PLATFORM_CAPABILITIES } from '../types.js';
import type { Formatter, Post, ProcessingResult, Publisher, SourceConfig, StateStore } from '../types.js';
import {
  appendVideoLink,
  createContext,
  filterReason,
  isMissingReplyTarget,
  renderText,
  selectUploadableMedia,
  type ProcessOptions,
  type ProcessingContext,
} from './steps.js';

export interface PostProcessorDeps {
  store: StateStore;
  publisher: Publisher;
  formatter: Formatter;
  logger: Logger;
  /** Without a detector, edits are published as new posts. */
  editDetector?: EditDetector;
  urlProcessor?: UrlProcessor;
}

export type ProcessPost = (post: Post, sourceConfig: SourceConfig, options?: ProcessOptions) => Promise<ProcessingResult>;

function skipped(reason: string): ProcessingResult {
  return { status: 'skipped', skipped_reason: reason };
}

function usernameOf(ctx: ProcessingContext): string {
  return ctx.post.author.username || ctx.source_id.split('_')[0];
}

/**
 * Build the per-post pipeline:
 * dedup, edit check, filter, format, replace, trim, link cleanup, publish, record.
 */
export function createPostProcessor(deps: PostProcessorDeps): { processPost: ProcessPost } {
  const { store, publisher, formatter, logger } = deps;
  const defaultUrlProcessor = deps.urlProcessor ?? createUrlProcessor();

  function detectorFor(ctx: ProcessingContext): EditDetector | null {
    if (!deps.editDetector) return null;
    return PLATFORM_CAPABILITIES[ctx.platform].editDetection ? deps.editDetector : null;
  }

  function urlProcessorFor(options: ProcessOptions): UrlProcessor {
    return options.noTrimDomains ? createUrlProcessor(options.noTrimDomains) : defaultUrlProcessor;
  }

  async function uploadMedia(post: Post): Promise<string[]> {
    const uploadable = selectUploadableMedia(post.media);
    if (uploadable.length === 0) return [];
    return publisher.uploadMediaParallel(uploadable.map((media) => ({ url: media.url, description: media.alt_text })));
  }

  async function publish(ctx: ProcessingContext, text: string, log: Logger): Promise<string> {
    const mediaIds = await uploadMedia(ctx.post);
    const status = appendVideoLink(text, ctx.post, ctx.sourceConfig, mediaIds.length);
    const visibility = ctx.sourceConfig.target?.visibility ?? 'public';
    const inReplyToId = ctx.options.inReplyToId ?? null;

    try {
      const result = await publisher.publish({ text: status, media_ids: mediaIds, visibility, in_reply_to_id: inReplyToId });
      return result.id;
    } catch (err) {
      if (!inReplyToId || !isMissingReplyTarget(err)) throw err;
      log.warn({ inReplyToId }, 'thread parent not found, publishing as standalone');
      const result = await publisher.publish({ text: status, media_ids: mediaIds, visibility });
      return result.id;
    }
  }

  function addToBuffer(ctx: ProcessingContext, detector: EditDetector | null, publishedId: string | null, log: Logger): void {
    if (!detector) return;
    try {
      detector.addToBuffer({
        sourceId: ctx.source_id,
        postId: ctx.post_id,
        username: usernameOf(ctx),
        text: ctx.post.text,
        publishedId,
      });
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'failed to add post to edit buffer');
    }
  }

  function markBufferPublished(ctx: ProcessingContext, detector: EditDetector | null, publishedId: string, log: Logger): void {
    if (!detector) return;
    try {
      detector.updateBufferPublishedId(ctx.source_id, ctx.post_id, publishedId);
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'failed to record published id in edit buffer');
    }
  }

  function record(ctx: ProcessingContext, publishedId: string, detector: EditDetector | null, log: Logger): void {
    const platformUri = PLATFORM_CAPABILITIES[ctx.platform].recordsPlatformUri ? ctx.post.id : null;
    store.markPublished({
      source_id: ctx.source_id,
      post_id: ctx.post_id,
      post_url: ctx.post.url,
      published_id: publishedId,
      platform_uri: platformUri,
    });
    store.logPublish(ctx.source_id, ctx.post_id, { post_url: ctx.post.url, published_id: publishedId });
    markBufferPublished(ctx, detector, publishedId, log);
    log.info({ publishedId }, 'published');
  }

  async function processAsUpdate(
    ctx: ProcessingContext,
    edit: EditCheckResult,
    publishedId: string,
    detector: EditDetector,
    log: Logger,
  ): Promise<ProcessingResult> {
    const text = renderText(ctx.post, ctx.sourceConfig, formatter, urlProcessorFor(ctx.options));

    if (ctx.options.dryRun) {
      log.info({ publishedId, preview: text.slice(0, 100) }, 'dry run, would update');
      return { status: 'published', published_id: publishedId };
    }

    try {
      const mediaIds = await uploadMedia(ctx.post);
      await publisher.updateStatus(publishedId, text, mediaIds.length > 0 ? mediaIds : undefined);
    } catch (err) {
      log.warn({ publishedId, err: errorMessage(err) }, 'update failed, publishing as new');
      addToBuffer(ctx, detector, null, log);
      const newId = await publish(ctx, text, log);
      record(ctx, newId, detector, log);
      return { status: 'published', published_id: newId };
    }

    store.markUpdated(publishedId, ctx.post_id, ctx.post.url);
    store.logUpdate(ctx.source_id, ctx.post_id, {
      published_id: publishedId,
      original_post_id: edit.original_post_id,
      similarity: Math.round(edit.similarity * 100) / 100,
    });
    addToBuffer(ctx, detector, publishedId, log);
    log.info({ publishedId, original: edit.original_post_id }, 'updated');
    return { status: 'published', published_id: publishedId };
  }

  async function processPost(post: Post, sourceConfig: SourceConfig, options: ProcessOptions = {}): Promise<ProcessingResult> {
    const ctx = createContext(post, sourceConfig, options);
    const log = logger.child({ sourceId: ctx.source_id, postId: ctx.post_id });

    try {
      if (store.isPublished(ctx.source_id, ctx.post_id)) {
        log.debug('already published');
        return skipped('already_published');
      }

      const detector = detectorFor(ctx);
      if (detector) {
        const edit = detector.checkForEdit({
          sourceId: ctx.source_id,
          postId: ctx.post_id,
          username: usernameOf(ctx),
          text: post.text,
        });

        if (edit.action === 'skip_older_version') {
          log.info({ original: edit.original_post_id, similarity: edit.similarity }, 'older version of a known post');
          store.logSkip(ctx.source_id, ctx.post_id, 'older_version', { original_post_id: edit.original_post_id });
          return skipped('older_version');
        }

        if (edit.action === 'update_existing') {
          if (edit.published_id) return await processAsUpdate(ctx, edit, edit.published_id, detector, log);
          log.warn({ original: edit.original_post_id }, 'edit detected without a published id, publishing as new');
        }
      }

      const reason = filterReason(post, sourceConfig);
      if (reason) {
        log.debug({ reason }, 'filtered');
        store.logSkip(ctx.source_id, ctx.post_id, reason);
        return skipped(reason);
      }

      const text = renderText(post, sourceConfig, formatter, urlProcessorFor(options));

      if (options.dryRun) {
        log.info({ preview: text.slice(0, 100) }, 'dry run, would publish');
        return { status: 'published' };
      }

      // Buffered as seen; the status id is filled in by record()
      addToBuffer(ctx, detector, null, log);
      const publishedId = await publish(ctx, text, log);
      record(ctx, publishedId, detector, log);
      return { status: 'published', published_id: publishedId };
    } catch (err) {
      const message = errorMessage(err);
      log.error({ err: message }, 'processing failed');
      try {
        store.logError(ctx.source_id, ctx.post_id, message);
      } catch (logErr) {
        log.warn({ err: errorMessage(logErr) }, 'failed to record error in activity log');
      }
      return { status: 'failed', error: message };
    }
  }

  return { processPost };
}
