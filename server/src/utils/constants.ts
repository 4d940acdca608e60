export const ENDPOINTS = {
  DOWNLOAD: '/api/download',
  INFO: '/api/info',
  HEALTH: '/health'
} as const;

export const UPSTREAM_PATHS = {
  LIST: '/share/list',
  DOWNLOAD: '/share/download',
  SHARING_LINK: '/sharing/link'
} as const;

export const LIST_PARAMS = {
  root: '1',
  page: '1',
  num: '20',
  order: 'time',
  desc: '1',
  web: '1',
  channel: 'dubox',
  clienttype: '0'
} as const;

export const DOWNLOAD_PARAMS = {
  channel: 'dubox',
  clienttype: '0',
  web: '1',
  app_id: '250528'
} as const;

export const MESSAGES = {
  URL_REQUIRED: 'URL parameter is required',
  INVALID_URL: 'Invalid Terabox URL',
  URL_NOT_STRING: 'URL parameter must be a string',
  NO_FILES: 'No files found in the link',
  FETCH_FAILED: 'Failed to fetch data from Terabox',
  UNEXPECTED_RESPONSE: 'Unexpected response from Terabox',
  INVALID_BODY: 'Invalid request body',
  METHOD_NOT_ALLOWED: 'Method not allowed',
  NOT_FOUND: 'Not found',
  SERVER_ERROR: 'Internal server error'
} as const;
