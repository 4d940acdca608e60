import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { upstream } from '../config.js';
import type {
  ApiResult,
  FileDetails,
  FileInfoOptions,
  FileRecord,
  ListingResult
} from '../types.js';
import { DOWNLOAD_PARAMS, LIST_PARAMS, MESSAGES, UPSTREAM_PATHS } from '../utils/constants.js';
import { extractSurl } from '../utils/surl.js';
import type { FileInfoProvider } from './file-info-provider.js';

const errnoSchema = z.union([z.number(), z.string()]).nullish();

// Share listings send numeric fields either as numbers or as digit strings.
const listEntrySchema = z.object({
  server_filename: z.string().nullish(),
  size: z.coerce.number().nullish(),
  fs_id: z.union([z.number(), z.string()]).nullish(),
  thumbs: z.object({ url3: z.string().nullish() }).nullish(),
  category: z.coerce.number().nullish(),
  isdir: z.coerce.number().nullish()
});

const listStatusSchema = z.object({ errno: errnoSchema });

const listBodySchema = z.object({
  list: z.array(listEntrySchema).nullish()
});

const downloadResponseSchema = z.object({
  errno: errnoSchema,
  dlink: z.string().nullish()
});

type ListEntry = z.infer<typeof listEntrySchema>;

export function createUpstreamHttp(): AxiosInstance {
  return axios.create({
    baseURL: upstream.baseUrl,
    timeout: upstream.timeoutMs,
    headers: { ...upstream.headers },
    // Status codes are interpreted by the caller, including redirects.
    validateStatus: () => true
  });
}

function toFileRecord(entry: ListEntry): FileRecord {
  return {
    filename: entry.server_filename ?? 'Unknown',
    size: entry.size ?? 0,
    fsId: entry.fs_id ?? null,
    thumbnail: entry.thumbs?.url3 ?? '',
    category: entry.category ?? 0,
    isdir: entry.isdir ?? 0
  };
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export class TeraboxClient implements FileInfoProvider {
  constructor(private readonly http: AxiosInstance = createUpstreamHttp()) {}

  /**
   * Anti-bot token sent with listing requests.
   *
   * The provider derives this value in page scripts; it is deliberately not
   * reproduced here and a constant placeholder is sent instead, so the
   * provider may reject or degrade listing calls at any time.
   */
  jsToken(_surl: string) {
    return 'undefined';
  }

  async listShare(surl: string): Promise<ListingResult> {
    try {
      const response = await this.http.get<unknown>(UPSTREAM_PATHS.LIST, {
        params: { shorturl: surl, ...LIST_PARAMS, jsToken: this.jsToken(surl) }
      });

      if (response.status !== 200) {
        return { kind: 'transport-error', message: MESSAGES.FETCH_FAILED };
      }

      const status = listStatusSchema.safeParse(response.data);
      if (!status.success) {
        return { kind: 'transport-error', message: `Error: ${MESSAGES.UNEXPECTED_RESPONSE}` };
      }

      const { errno } = status.data;
      if (errno !== 0) {
        return { kind: 'upstream-error', errno: errno ?? undefined };
      }

      const body = listBodySchema.safeParse(response.data);
      if (!body.success) {
        return { kind: 'transport-error', message: `Error: ${MESSAGES.UNEXPECTED_RESPONSE}` };
      }

      const [first] = body.data.list ?? [];
      if (!first) {
        return { kind: 'empty' };
      }

      return { kind: 'file', file: toFileRecord(first) };
    } catch (error) {
      return { kind: 'transport-error', message: `Error: ${errorMessage(error)}` };
    }
  }

  async resolveDownloadUrl(file: FileRecord, surl: string): Promise<string> {
    const fidList = `[${file.fsId ?? 'null'}]`;
    try {
      const response = await this.http.get<unknown>(UPSTREAM_PATHS.DOWNLOAD, {
        params: { surl, fid_list: fidList, ...DOWNLOAD_PARAMS },
        maxRedirects: 0
      });

      if (response.status === 301 || response.status === 302) {
        const location = response.headers['location'];
        return typeof location === 'string' ? location : '';
      }

      if (response.status === 200) {
        const parsed = downloadResponseSchema.safeParse(response.data);
        if (parsed.success && parsed.data.errno === 0 && parsed.data.dlink) {
          return parsed.data.dlink;
        }
      }

      return `${upstream.baseUrl}${UPSTREAM_PATHS.DOWNLOAD}?surl=${surl}&fid_list=${fidList}`;
    } catch (error) {
      console.warn(`Не удалось получить ссылку на скачивание (${surl}):`, errorMessage(error));
      return `${upstream.baseUrl}${UPSTREAM_PATHS.SHARING_LINK}?surl=${surl}`;
    }
  }

  async getFileInfo(url: string, options: FileInfoOptions): Promise<ApiResult<FileDetails>> {
    const surl = extractSurl(url);
    if (!surl) {
      return { success: false, message: MESSAGES.INVALID_URL };
    }

    const listing = await this.listShare(surl);
    switch (listing.kind) {
      case 'transport-error':
        return { success: false, message: listing.message };
      case 'upstream-error':
        return { success: false, message: `Terabox API Error: ${listing.errno ?? 'unknown'}` };
      case 'empty':
        return { success: false, message: MESSAGES.NO_FILES };
      case 'file':
        break;
    }

    const { file } = listing;
    const downloadUrl = options.withDownloadUrl
      ? await this.resolveDownloadUrl(file, surl)
      : undefined;

    return {
      success: true,
      data: {
        filename: file.filename,
        size: file.size,
        fs_id: file.fsId,
        ...(downloadUrl === undefined ? {} : { download_url: downloadUrl }),
        thumbnail: file.thumbnail,
        category: file.category,
        isdir: file.isdir
      }
    };
  }
}
