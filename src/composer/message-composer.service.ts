import { Injectable, Logger } from '@nestjs/common';
import { simpleParser } from 'mailparser';
import type { HeaderValue, ParsedMail, StructuredHeader } from 'mailparser';
import { getErrorMessage } from '../shared/error.utils';
import { CompositionError } from '../shared/errors';
import {
  ATTACHMENTS_OMITTED_TEXT,
  BODY_UNAVAILABLE_TEXT,
  DEFAULT_ATTACHMENT_CONTENT_TYPE,
  FORWARDED_SUBJECT_PREFIX,
  NO_BODY_TEXT,
} from './composer.constants';
import { Fidelity } from './interfaces/composed-message.interface';
import type {
  ComposedAttachment,
  DegradedComposedMessage,
  FullComposedMessage,
} from './interfaces/composed-message.interface';
import { formatSender, normalizeHeaderText } from './utils/header.utils';
import { escapeHtml } from './utils/html.utils';
import { splitMimeLeaves } from './utils/mime-tree.utils';
import type { MimeLeaf } from './utils/mime-tree.utils';

interface OriginalHeaders {
  subject: string;
  sender: string;
}

interface ExtractedBody {
  html?: string;
  text?: string;
}

/** One leaf entity of the source message, parsed on its own */
interface MessagePart {
  /** Lower-cased MIME type, `text/plain` when the part declares none */
  type: string;
  inline: boolean;
  embedded: boolean;
  filename?: string;
  parsed: ParsedMail;
}

/**
 * Turns fetched source bytes into the message handed to the relay.
 *
 * Both modes decode the original subject and sender the same way and prefer an
 * HTML body over plain text. Neither mode performs I/O.
 */
@Injectable()
export class MessageComposerService {
  private readonly logger = new Logger(MessageComposerService.name);

  /**
   * Builds a full-fidelity message: the original body plus every named attachment.
   *
   * @throws {CompositionError} If the bytes cannot be parsed as a message
   */
  async composeFull(raw: Buffer): Promise<FullComposedMessage> {
    const original = this.readHeaders(await this.parse(raw, 'message'));
    const parts = await this.readParts(raw);
    const bodyPart = selectBodyPart(parts);
    const body = bodyPart ? readBody(bodyPart) : {};
    const attachments = parts
      .filter((part) => part !== bodyPart && part.filename !== undefined)
      .map(toComposedAttachment);

    const banner = `--- Original sender: ${original.sender} ---`;
    const rendered: ExtractedBody =
      body.html !== undefined
        ? { html: `<p style="color:gray;font-size:12px;">${escapeHtml(banner)}</p><hr>${body.html}` }
        : { text: `${banner}\n\n${body.text ?? NO_BODY_TEXT}` };

    this.logger.debug(`Composed full message "${original.subject}" with ${attachments.length} attachment(s)`);

    return {
      fidelity: Fidelity.FULL,
      subject: forwardedSubject(original.subject),
      originalSubject: original.subject,
      originalSender: original.sender,
      ...rendered,
      attachments,
    };
  }

  /**
   * Builds a text-only message from the header block and the extracted text
   * entity. Attachments are never carried; the body says so.
   *
   * @throws {CompositionError} If the header block cannot be parsed
   */
  async composeDegraded(header: Buffer, bodyText: Buffer): Promise<DegradedComposedMessage> {
    const original = this.readHeaders(await this.parse(header, 'header block'));
    const bodyPart = bodyText.length > 0 ? selectBodyPart(await this.readParts(bodyText)) : undefined;
    const body = bodyPart ? readBody(bodyPart) : {};

    const sender = escapeHtml(original.sender);
    const subject = escapeHtml(original.subject);
    const rendered: ExtractedBody =
      body.html !== undefined
        ? {
            html:
              '<div style="background:#f9f9f9;padding:10px;border:1px solid #eee;">' +
              `<b>From:</b> ${sender}<br><b>Subject:</b> ${subject}<br>` +
              `<i>[Notice] ${escapeHtml(ATTACHMENTS_OMITTED_TEXT)}</i></div><br>${body.html}`,
          }
        : {
            text:
              `--- Forwarded without attachments ---\nFrom: ${original.sender}\nSubject: ${original.subject}\n` +
              `${ATTACHMENTS_OMITTED_TEXT}\n\n${body.text ?? BODY_UNAVAILABLE_TEXT}`,
          };

    this.logger.debug(`Composed degraded message "${original.subject}"`);

    return {
      fidelity: Fidelity.DEGRADED,
      subject: forwardedSubject(original.subject),
      originalSubject: original.subject,
      originalSender: original.sender,
      ...rendered,
      attachments: [],
    };
  }

  private async parse(raw: Buffer, what: string): Promise<ParsedMail> {
    if (raw.length === 0) {
      throw new CompositionError(`Cannot compose from an empty ${what}`);
    }

    const parsed = await this.parseEntity(raw, what);
    if (parsed.headers.size === 0) {
      throw new CompositionError(`The ${what} has no header block`);
    }

    return parsed;
  }

  private async parseEntity(entity: Buffer, what: string): Promise<ParsedMail> {
    try {
      return await simpleParser(entity, {
        skipHtmlToText: true,
        skipTextToHtml: true,
        skipTextLinks: true,
        skipImageLinks: true,
      });
    } catch (error) {
      throw new CompositionError(`Failed to parse ${what}: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Parses every leaf entity separately. A whole-message parse merges inline
   * text parts into one body and hides the ones that carry a filename.
   */
  private async readParts(raw: Buffer): Promise<MessagePart[]> {
    let leaves: MimeLeaf[];
    try {
      leaves = await splitMimeLeaves(raw);
    } catch (error) {
      throw new CompositionError(`Failed to split message: ${getErrorMessage(error)}`, { cause: error });
    }

    const parts: MessagePart[] = [];
    for (const leaf of leaves) {
      const parsed = await this.parseEntity(leaf.entity, 'message part');
      const contentType = structuredHeader(parsed.headers.get('content-type'));
      const disposition = structuredHeader(parsed.headers.get('content-disposition'));
      const filename = normalizeHeaderText(
        parsed.attachments[0]?.filename ?? disposition?.params.filename ?? contentType?.params.name,
      );

      parts.push({
        type: contentType?.value.toLowerCase() ?? 'text/plain',
        inline: disposition?.value.toLowerCase() !== 'attachment',
        embedded: leaf.embedded,
        filename: filename.length > 0 ? filename : undefined,
        parsed,
      });
    }
    return parts;
  }

  private readHeaders(parsed: ParsedMail): OriginalHeaders {
    return {
      subject: normalizeHeaderText(parsed.subject),
      sender: formatSender(parsed.from),
    };
  }
}

function forwardedSubject(subject: string): string {
  return `${FORWARDED_SUBJECT_PREFIX}${subject}`.trim();
}

function structuredHeader(value: HeaderValue | undefined): StructuredHeader | undefined {
  if (typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date) && 'params' in value) {
    return value;
  }
  return undefined;
}

function htmlOf(part: MessagePart): string | undefined {
  return typeof part.parsed.html === 'string' && part.parsed.html.trim().length > 0 ? part.parsed.html : undefined;
}

function textOf(part: MessagePart): string | undefined {
  return part.parsed.text !== undefined && part.parsed.text.trim().length > 0 ? part.parsed.text : undefined;
}

/**
 * The first inline `text/html` part of the message itself, else the first
 * inline `text/plain` one. Parts of attached messages never qualify.
 */
function selectBodyPart(parts: MessagePart[]): MessagePart | undefined {
  const candidates = parts.filter((part) => part.inline && !part.embedded);
  return (
    candidates.find((part) => part.type === 'text/html' && htmlOf(part) !== undefined) ??
    candidates.find((part) => part.type === 'text/plain' && textOf(part) !== undefined)
  );
}

function readBody(part: MessagePart): ExtractedBody {
  return part.type === 'text/html' ? { html: htmlOf(part) } : { text: textOf(part) };
}

function toComposedAttachment(part: MessagePart): ComposedAttachment {
  const filename = part.filename ?? '';
  const [file] = part.parsed.attachments;
  if (file) {
    return { filename, contentType: file.contentType || DEFAULT_ATTACHMENT_CONTENT_TYPE, content: file.content };
  }

  // inline text parts come back decoded, so they are re-encoded as UTF-8
  const text = typeof part.parsed.html === 'string' ? part.parsed.html : (part.parsed.text ?? '');
  return { filename, contentType: `${part.type}; charset=utf-8`, content: Buffer.from(text, 'utf-8') };
}
