import fs from 'node:fs';
import path from 'node:path';
import {
    HtmlMaterializer,
    rewriteContentIdReferences,
    sanitizeFileName,
} from '../../src/services/viewer/HtmlMaterializer';
import { makeMessage, makeTempDir, testConfig } from '../helpers/fakes';

describe('rewriteContentIdReferences', () => {
    it('rewrites bare and quoted references', () => {
        const html = '<img src="cid:logo@test"><div style="background:url(cid:\'logo@test\')"></div>';

        expect(rewriteContentIdReferences(html, 'logo@test', 'logo.png')).toBe(
            '<img src="logo.png"><div style="background:url(logo.png)"></div>',
        );
    });

    it('leaves longer ids that share a prefix alone', () => {
        expect(rewriteContentIdReferences('<img src="cid:logo@test.org">', 'logo@test', 'x')).toBe(
            '<img src="cid:logo@test.org">',
        );
    });

    it('matches ids containing pattern characters literally', () => {
        expect(rewriteContentIdReferences('cid:a+b cid:aab', 'a+b', 'file')).toBe('file cid:aab');
    });
});

describe('sanitizeFileName', () => {
    it('keeps safe names', () => {
        expect(sanitizeFileName('logo@test.png')).toBe('logo@test.png');
    });

    it('neutralizes path separators and leading dots', () => {
        expect(sanitizeFileName('../evil/name')).toBe('__evil_name');
    });

    it('falls back to a fixed name for empty input', () => {
        expect(sanitizeFileName('')).toBe('resource');
    });
});

describe('HtmlMaterializer', () => {
    it('writes the body and its resources into the render directory', async () => {
        const scratchDir = makeTempDir('materializer');
        const materializer = new HtmlMaterializer(testConfig({ scratchDir }));

        const htmlFile = await materializer.materialize(
            'session-7',
            makeMessage({
                body: { kind: 'html', text: '<img src="cid:a/b">' },
                inlineResources: [{ contentId: 'a/b', contentType: 'image/gif', content: Buffer.from('gif') }],
            }),
        );

        expect(htmlFile).toBe(path.join(scratchDir, 'session-7', 'message.html'));
        expect(fs.readFileSync(htmlFile, 'utf-8')).toBe('<img src="a_b">');
        expect(fs.readFileSync(path.join(scratchDir, 'session-7', 'a_b'), 'utf-8')).toBe('gif');
    });

    it('gives every resource its own file when sanitized names collide', async () => {
        const scratchDir = makeTempDir('materializer');
        const materializer = new HtmlMaterializer(testConfig({ scratchDir }));

        const htmlFile = await materializer.materialize(
            'session-3',
            makeMessage({
                body: { kind: 'html', text: '<img src="cid:a b"><img src="cid:a_b"><img src="cid:message.html">' },
                inlineResources: [
                    { contentId: 'a b', contentType: 'image/png', content: Buffer.from('ONE') },
                    { contentId: 'a_b', contentType: 'image/png', content: Buffer.from('TWO') },
                    { contentId: 'message.html', contentType: 'image/png', content: Buffer.from('THREE') },
                ],
            }),
        );

        const dir = path.join(scratchDir, 'session-3');
        expect(fs.readdirSync(dir).sort()).toEqual(['2-a_b', '2-message.html', 'a_b', 'message.html']);
        expect(fs.readFileSync(htmlFile, 'utf-8')).toBe('<img src="a_b"><img src="2-a_b"><img src="2-message.html">');
        expect(fs.readFileSync(path.join(dir, 'a_b'), 'utf-8')).toBe('ONE');
        expect(fs.readFileSync(path.join(dir, '2-a_b'), 'utf-8')).toBe('TWO');
        expect(fs.readFileSync(path.join(dir, '2-message.html'), 'utf-8')).toBe('THREE');
    });

    it('removes a render directory and tolerates unknown keys', async () => {
        const scratchDir = makeTempDir('materializer');
        const materializer = new HtmlMaterializer(testConfig({ scratchDir }));
        await materializer.materialize('session-1', makeMessage({ body: { kind: 'html', text: '<p>x</p>' } }));

        await materializer.release('session-1');
        await materializer.release('session-2');

        expect(fs.existsSync(materializer.directoryFor('session-1'))).toBe(false);
    });
});
