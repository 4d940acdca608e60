export interface FileRecord {
  filename: string;
  size: number;
  fsId: number | string | null;
  thumbnail: string;
  category: number;
  isdir: number;
}

/** Wire shape of a successful `data` payload. */
export interface FileDetails {
  filename: string;
  size: number;
  fs_id: number | string | null;
  download_url?: string;
  thumbnail: string;
  category: number;
  isdir: number;
}

export type ApiResult<T> = { success: true; data: T } | { success: false; message: string };

export type ListingResult =
  | { kind: 'file'; file: FileRecord }
  | { kind: 'empty' }
  | { kind: 'upstream-error'; errno: number | string | undefined }
  | { kind: 'transport-error'; message: string };

export interface FileInfoOptions {
  withDownloadUrl: boolean;
}
