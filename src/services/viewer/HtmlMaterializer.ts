import fs from 'node:fs';
import path from 'node:path';
import { Inject, Service } from 'typedi';
import { ViewerConfig, ViewerConfigToken } from '../../config/viewerConfig';
import { FullMessage } from '../../types/message';

const HTML_FILENAME = 'message.html';

/**
 * Writes a rich message body and its inline images into a per-render scratch
 * directory so a browser surface can load them from addressable locations.
 */
@Service()
export class HtmlMaterializer {
    private readonly scratchDir: string;

    constructor(@Inject(ViewerConfigToken) config: ViewerConfig) {
        this.scratchDir = config.scratchDir;
    }

    directoryFor(renderKey: string): string {
        return path.join(this.scratchDir, sanitizeFileName(renderKey));
    }

    async materialize(renderKey: string, message: FullMessage): Promise<string> {
        const dir = this.directoryFor(renderKey);
        await fs.promises.mkdir(dir, { recursive: true });

        let html = message.body.text;
        const taken = new Set<string>([HTML_FILENAME]);
        for (const resource of message.inlineResources) {
            const fileName = claimFileName(taken, sanitizeFileName(resource.contentId));
            await fs.promises.writeFile(path.join(dir, fileName), resource.content);
            html = rewriteContentIdReferences(html, resource.contentId, fileName);
        }

        const htmlFile = path.join(dir, HTML_FILENAME);
        await fs.promises.writeFile(htmlFile, html, 'utf-8');
        return htmlFile;
    }

    async release(renderKey: string): Promise<void> {
        await fs.promises.rm(this.directoryFor(renderKey), { recursive: true, force: true });
    }
}

/** Replaces `cid:ID`, `cid:'ID'` and `cid:"ID"` with `target`. */
export function rewriteContentIdReferences(html: string, contentId: string, target: string): string {
    const id = escapeRegExp(contentId);
    const pattern = new RegExp(`cid:(?:'${id}'|"${id}"|${id}(?![\\w.@$-]))`, 'g');
    return html.replace(pattern, target);
}

export function sanitizeFileName(value: string): string {
    const sanitized = value.replace(/[^a-zA-Z0-9._@-]/g, '_').replace(/^\.+/, '_');
    return sanitized || 'resource';
}

// Case-insensitive so names stay distinct on case-folding file systems.
function claimFileName(taken: Set<string>, name: string): string {
    let candidate = name;
    for (let counter = 2; taken.has(candidate.toLowerCase()); counter += 1) {
        candidate = `${counter}-${name}`;
    }
    taken.add(candidate.toLowerCase());
    return candidate;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
