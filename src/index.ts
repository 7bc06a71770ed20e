export { parse, parseHtml, classifyLayout, DEFAULT_LAYOUT_ORDER } from './backend/parser/ListingParser';
export type { ParseOptions } from './backend/parser/ListingParser';
export { parseSize, isSizeLike } from './backend/parser/SizeParser';
export type { SizeUnits } from './backend/parser/SizeParser';
export { parseDateTime, toEpochSeconds, fromEpochSeconds } from './backend/parser/DateTimeParser';
export { parseCurrentDirectory } from './backend/parser/CurrentDirectoryParser';
export type {
  FileEntry,
  Layout,
  LocalDateTime,
  ParsedListing,
  RemoteEntry,
  RemoteListing,
  RemoteStat,
} from './backend/models/Models';
export { InvalidDocumentError, HttpStatusError, ConfigError } from './backend/errors';
export { ListingFetch } from './backend/http/ListingFetch';
export type { ListingFetchOptions, FetchFn } from './backend/http/ListingFetch';
export { ListingService } from './backend/services/ListingService';
export type { ListingServiceOptions, WalkOptions } from './backend/services/ListingService';
export { DownloadService } from './backend/services/DownloadService';
export type { DownloadItem } from './backend/services/DownloadService';
export { toFileStat, humanSize, parseHttpDate } from './backend/fs/FileStat';
export type { FileStat } from './backend/fs/FileStat';
export { loadConfig } from './globalConfig';
export type { GlobalConfig } from './globalConfig';
export { OutputChannel } from './utils/OutputChannel';
export type { LogLevel } from './utils/OutputChannel';
