import { ClientError, UnexpectedShapeError, ValidationError } from './errors.js';
import { readNonEmptyString, readNumber, readString } from './json.js';
import type { AbstractConstructor, Mixin, TwitterClientBase } from './twitter-client-base.js';
import { TWITTER_MEDIA_METADATA_URL, TWITTER_UPLOAD_URL } from './twitter-client-constants.js';
import type { UploadMediaInput, UploadMediaResult } from './twitter-client-types.js';

const SEGMENT_BYTES = 5 * 1024 * 1024;
const MAX_STATUS_POLLS = 30;
const DEFAULT_CHECK_AFTER_SECS = 2;

export interface TwitterClientMediaMethods {
  uploadMedia(input: UploadMediaInput): Promise<UploadMediaResult>;
}

export function mediaCategoryFor(mimeType: string): string {
  const type = mimeType.toLowerCase();
  if (type === 'image/gif') {
    return 'tweet_gif';
  }
  if (type.startsWith('image/')) {
    return 'tweet_image';
  }
  if (type.startsWith('video/')) {
    return 'tweet_video';
  }
  throw new ValidationError(`Unsupported media type: ${mimeType}`);
}

export function withMedia<TBase extends AbstractConstructor<TwitterClientBase>>(
  Base: TBase,
): Mixin<TBase, TwitterClientMediaMethods> {
  abstract class TwitterClientMedia extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Chunked upload (INIT, APPEND, FINALIZE, then STATUS polling for video).
     * The returned id goes into PostTweetOptions.mediaIds.
     */
    async uploadMedia(input: UploadMediaInput): Promise<UploadMediaResult> {
      if (input.data.byteLength === 0) {
        throw new ValidationError('Media is empty');
      }
      const category = mediaCategoryFor(input.mimeType);
      const signal = input.signal;

      const init = await this.uploadCommand(
        {
          command: 'INIT',
          total_bytes: String(input.data.byteLength),
          media_type: input.mimeType,
          media_category: category,
        },
        signal,
      );
      const mediaId = readNonEmptyString(init, 'media_id_string');
      if (!mediaId) {
        throw new UnexpectedShapeError('Media INIT response is missing media_id_string');
      }

      for (let offset = 0, segment = 0; offset < input.data.byteLength; offset += SEGMENT_BYTES, segment++) {
        const form = new FormData();
        form.append('command', 'APPEND');
        form.append('media_id', mediaId);
        form.append('segment_index', String(segment));
        form.append('media', new Blob([input.data.subarray(offset, offset + SEGMENT_BYTES)], { type: input.mimeType }));
        await this.request(
          { method: 'POST', url: TWITTER_UPLOAD_URL, body: { kind: 'multipart', value: form }, mutating: true },
          { name: 'uploadMedia', signal },
        );
      }

      const finalized = await this.uploadCommand({ command: 'FINALIZE', media_id: mediaId }, signal);
      const processingState = await this.waitForProcessing(mediaId, finalized, signal);

      if (input.alt) {
        await this.request(
          {
            method: 'POST',
            url: TWITTER_MEDIA_METADATA_URL,
            body: { kind: 'json', value: { media_id: mediaId, alt_text: { text: input.alt } } },
            mutating: true,
          },
          { name: 'uploadMedia', signal },
        );
      }

      this.logger.info('media', 'media_uploaded', { mediaId, category, bytes: input.data.byteLength });
      return { mediaId, processingState };
    }

    private async uploadCommand(form: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
      const response = await this.restPost(TWITTER_UPLOAD_URL, form, { name: 'uploadMedia', signal });
      return response.body;
    }

    private async waitForProcessing(
      mediaId: string,
      finalized: unknown,
      signal?: AbortSignal,
    ): Promise<string | undefined> {
      let info: unknown = finalized;
      for (let poll = 0; poll <= MAX_STATUS_POLLS; poll++) {
        const state = readString(info, 'processing_info', 'state');
        if (state === undefined || state === 'succeeded') {
          return state;
        }
        if (state === 'failed') {
          const message = readString(info, 'processing_info', 'error', 'message') ?? 'unknown error';
          throw new ClientError(`Media processing failed: ${message}`);
        }

        const checkAfter = readNumber(info, 'processing_info', 'check_after_secs') ?? DEFAULT_CHECK_AFTER_SECS;
        this.logger.debug('media', 'processing_pending', { mediaId, state, checkAfter });
        await this.sleep(checkAfter * 1000, signal);

        const response = await this.request(
          {
            method: 'GET',
            url: TWITTER_UPLOAD_URL,
            query: { command: 'STATUS', media_id: mediaId },
            mutating: false,
          },
          { name: 'uploadMedia', signal },
        );
        info = response.body;
      }
      throw new ClientError(`Media ${mediaId} still processing after ${MAX_STATUS_POLLS} status checks`);
    }
  }

  return TwitterClientMedia;
}
