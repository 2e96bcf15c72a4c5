import { Splitter } from 'mailsplit';
import type { MimeNode, SplitterChunk } from 'mailsplit';

/**
 * A single non-multipart entity of a message, in tree order.
 */
export interface MimeLeaf {
  /** Header block plus the still transfer-encoded body */
  entity: Buffer;
  /** Inside a message/rfc822 part rather than the message itself */
  embedded: boolean;
}

interface PendingLeaf {
  node: MimeNode;
  chunks: Buffer[];
}

function isEmbedded(node: MimeNode): boolean {
  // only a message/rfc822 node has children without being multipart
  for (let parent = node.parentNode; parent; parent = parent.parentNode) {
    if (!parent.multipart) {
      return true;
    }
  }
  return false;
}

/**
 * Splits a raw message into its leaf entities.
 */
export function splitMimeLeaves(raw: Buffer): Promise<MimeLeaf[]> {
  return new Promise((resolve, reject) => {
    const splitter = new Splitter();
    const pending: PendingLeaf[] = [];
    const containers = new Set<MimeNode>();
    let current: PendingLeaf | undefined;

    splitter.on('data', (chunk: SplitterChunk) => {
      if (chunk.type === 'node') {
        if (chunk.parentNode) {
          containers.add(chunk.parentNode);
        }
        current = chunk.multipart ? undefined : { node: chunk, chunks: [] };
        if (current) {
          pending.push(current);
        }
      } else if (chunk.type === 'body' && current) {
        current.chunks.push(chunk.value);
      }
    });
    splitter.once('error', reject);
    splitter.once('end', () => {
      resolve(
        pending
          .filter((leaf) => !containers.has(leaf.node))
          .map((leaf) => ({
            entity: Buffer.concat([leaf.node.getHeaders(), ...leaf.chunks]),
            embedded: isEmbedded(leaf.node),
          })),
      );
    });

    splitter.end(raw);
  });
}
