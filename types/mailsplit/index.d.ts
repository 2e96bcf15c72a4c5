declare module 'mailsplit' {
  import { Transform } from 'stream';

  export interface SplitterOptions {
    ignoreEmbedded?: boolean;
    maxHeadSize?: number;
  }

  export interface MimeNode {
    type: 'node';
    root: boolean;
    parentNode?: MimeNode | false;
    /** Multipart subtype such as `mixed`, false for leaf nodes */
    multipart: string | false;
    contentType: string | false;
    /** Header block including the terminating blank line */
    getHeaders(): Buffer;
  }

  export interface BodyChunk {
    type: 'body';
    value: Buffer;
  }

  export interface DataChunk {
    type: 'data';
    value: Buffer;
  }

  export type SplitterChunk = MimeNode | BodyChunk | DataChunk;

  export class Splitter extends Transform {
    constructor(options?: SplitterOptions);
  }
}
