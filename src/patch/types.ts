export interface PatchFile {
  /** Path of the patch inside its archive, or the download's file name. */
  name: string;
  data: Uint8Array;
}

export interface PatchBundle {
  patches: PatchFile[];
  readme?: string;
}

export interface DownloadedFile {
  url: string;
  contentType: string;
  data: Uint8Array;
}

export interface PatchRequest {
  url: string;
  title?: string;
}

export interface PatchResult {
  engine: string;
  outputs: string[];
  readme?: string;
  launched: boolean;
}
