import type { ApiResult, FileDetails, FileInfoOptions } from '../types.js';

export interface FileInfoProvider {
  getFileInfo(url: string, options: FileInfoOptions): Promise<ApiResult<FileDetails>>;
}
