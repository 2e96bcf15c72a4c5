import type { MessageOutline } from '../interfaces/mailbox-client.interface';

const PREFERRED_TEXT_TYPES = ['text/html', 'text/plain'];

const EMBEDDED_MESSAGE_TYPE = 'message/rfc822';

function isAttachment(node: MessageOutline): boolean {
  return node.disposition?.toLowerCase() === 'attachment';
}

// attached files and attached messages are not descended into
function collectLeaves(node: MessageOutline, leaves: MessageOutline[] = []): MessageOutline[] {
  if (node.type.toLowerCase() === EMBEDDED_MESSAGE_TYPE || isAttachment(node)) {
    leaves.push(node);
  } else if (node.childNodes && node.childNodes.length > 0) {
    for (const child of node.childNodes) {
      collectLeaves(child, leaves);
    }
  } else {
    leaves.push(node);
  }
  return leaves;
}

export function isMultipart(outline: MessageOutline): boolean {
  return (outline.childNodes?.length ?? 0) > 0;
}

export function isTextType(type: string): boolean {
  return PREFERRED_TEXT_TYPES.includes(type.toLowerCase());
}

/**
 * Picks the section to relay in text-only mode.
 *
 * The first inline `text/html` leaf wins, else the first inline `text/plain`
 * leaf. Parts with an attachment disposition and the contents of attached
 * messages are never chosen.
 *
 * @returns Section number, or undefined when the message has no usable text part
 */
export function selectTextPart(root: MessageOutline): string | undefined {
  const inlineLeaves = collectLeaves(root).filter((leaf) => leaf.part !== undefined && !isAttachment(leaf));

  for (const type of PREFERRED_TEXT_TYPES) {
    const match = inlineLeaves.find((leaf) => leaf.type.toLowerCase() === type);
    if (match) {
      return match.part;
    }
  }

  return undefined;
}

/**
 * Looks up a fetched section by specifier, ignoring case.
 */
export function findBodyPart(parts: Map<string, Buffer> | undefined, section: string): Buffer | undefined {
  if (!parts) {
    return undefined;
  }

  const wanted = section.toLowerCase();
  for (const [key, value] of parts) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}
