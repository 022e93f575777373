import { AddressObject, ParsedMail } from 'mailparser';
import { FullMessage, InlineResource, MessageBody } from '../types/message';

export function addressText(value: AddressObject | AddressObject[] | undefined): string {
    if (!value) {
        return '';
    }
    if (Array.isArray(value)) {
        return value.map((address) => address.text).filter(Boolean).join(', ');
    }
    return value.text;
}

export function toFullMessage(parsed: ParsedMail): FullMessage {
    const html = typeof parsed.html === 'string' && parsed.html.trim().length > 0 ? parsed.html : undefined;
    const text = parsed.text ?? '';

    let body: MessageBody;
    let plainText: string | undefined;
    if (html !== undefined) {
        body = { kind: 'html', text: html };
        plainText = text.trim().length > 0 ? text : undefined;
    } else {
        body = { kind: 'text', text };
    }

    const date = parsed.date instanceof Date && !Number.isNaN(parsed.date.getTime()) ? parsed.date : null;

    return {
        headers: parsed.headerLines.map((header) => ({ key: header.key, line: header.line })),
        from: addressText(parsed.from),
        to: addressText(parsed.to),
        cc: addressText(parsed.cc),
        bcc: addressText(parsed.bcc),
        date,
        subject: parsed.subject ?? '',
        body,
        plainText,
        inlineResources: collectInlineImages(parsed),
    };
}

function collectInlineImages(parsed: ParsedMail): InlineResource[] {
    return parsed.attachments
        .filter((attachment) => Boolean(attachment.cid?.trim()) && attachment.contentType.startsWith('image/'))
        .map((attachment) => ({
            contentId: (attachment.cid ?? '').trim(),
            contentType: attachment.contentType,
            content: attachment.content,
        }));
}
