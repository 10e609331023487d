import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DebugCapture, debugTimestamp } from '../../src/tracker/debug/DebugCapture.js';
import { createMockPage, MockPage, silentLogger } from '../helpers/fakes.js';

const fixedNow = () => new Date(2025, 3, 6, 16, 4, 31);

describe('debugTimestamp', () => {
    it('formats local time as YYYYMMDD_HHMMSS', () => {
        expect(debugTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('20250102_030405');
    });
});

describe('DebugCapture', () => {
    let dir: string;
    let page: MockPage;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tracker-debug-'));
        page = createMockPage();
        page.content.mockResolvedValue('<html><body>router</body></html>');
        page.screenshot.mockResolvedValue(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('saves screenshot, page source and state snapshot', async () => {
        page.evaluate.mockResolvedValue('[\n  {\n    "Active": true\n  }\n]');
        const capture = new DebugCapture(path.join(dir, 'debug'), silentLogger(), 'device_cfg', fixedNow);

        const artifacts = await capture.capture(page, 'device_list_failure');

        const base = path.join(dir, 'debug', 'device_list_failure_20250406_160431');
        expect(artifacts).toEqual({
            screenshot: `${base}.png`,
            html: `${base}.html`,
            state: `${base}.state.json`
        });
        expect(fs.readFileSync(`${base}.png`)).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
        expect(fs.readFileSync(`${base}.html`, 'utf-8')).toBe('<html><body>router</body></html>');
        expect(fs.readFileSync(`${base}.state.json`, 'utf-8')).toBe('[\n  {\n    "Active": true\n  }\n]');
        expect(page.evaluate).toHaveBeenCalledWith(
            "JSON.stringify(typeof device_cfg === 'undefined' ? null : device_cfg, null, 2)"
        );
    });

    it('skips the state snapshot when the page has no state', async () => {
        page.evaluate.mockResolvedValue('null');
        const capture = new DebugCapture(dir, silentLogger(), 'device_cfg', fixedNow);

        const artifacts = await capture.capture(page, 'device_list_failure');

        expect(artifacts.state).toBeUndefined();
        expect(fs.readdirSync(dir).sort()).toEqual([
            'device_list_failure_20250406_160431.html',
            'device_list_failure_20250406_160431.png'
        ]);
    });

    it('does not read page state for a login failure', async () => {
        page.evaluate.mockResolvedValue('[]');
        const capture = new DebugCapture(dir, silentLogger(), 'device_cfg', fixedNow);

        const artifacts = await capture.capture(page, 'login_failure');

        expect(page.evaluate).not.toHaveBeenCalled();
        expect(artifacts).toEqual({
            screenshot: path.join(dir, 'login_failure_20250406_160431.png'),
            html: path.join(dir, 'login_failure_20250406_160431.html')
        });
        expect(fs.readdirSync(dir).sort()).toEqual([
            'login_failure_20250406_160431.html',
            'login_failure_20250406_160431.png'
        ]);
    });

    it('keeps going when one artifact fails', async () => {
        page.screenshot.mockRejectedValue(new Error('Target closed'));
        page.evaluate.mockRejectedValue(new Error('Execution context was destroyed'));
        const capture = new DebugCapture(dir, silentLogger(), 'device_cfg', fixedNow);

        const artifacts = await capture.capture(page, 'device_list_failure');

        expect(artifacts).toEqual({ html: path.join(dir, 'device_list_failure_20250406_160431.html') });
    });
});
