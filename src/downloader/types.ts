/**
 * Where the media of one recording can be fetched from
 */
export type MediaSource = {
  /** Direct media address, or a page address the downloader resolves itself */
  locator: string;
  /** The downloader must present `pageUrl` as referer */
  needsReferer: boolean;
  /** Page the source was found on */
  pageUrl: string;
};

export type DownloadRequest = {
  recordingNumber: number;
  locator: string;
  referer?: string;
  outputDir: string;
  /** Output file name without extension, e.g. `Recording_07` */
  fileStem: string;
};

export type Downloader = {
  /**
   * Fetch one recording into `outputDir`.
   * Throws `DownloadError` when the tool fails or times out.
   */
  download(request: DownloadRequest): Promise<void>;
};
