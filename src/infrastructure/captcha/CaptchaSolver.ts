import { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IOcrEngine } from '../../domain/ports/IOcrEngine';
import { SessionContext } from '../http/SessionContext';
import { describeHttpError } from '../http/HttpClient';

export type CaptchaSolution = { ok: true; text: string } | { ok: false; reason: string };

/**
 * Cleans raw OCR output: drops whitespace and quotes, and maps '[' (a common misread) to 'l'.
 */
export function cleanCaptchaText(raw: string): string {
    return raw.replace(/\s+/g, '').replace(/\[/g, 'l').replace(/'/g, '');
}

/**
 * Reads image CAPTCHAs with an OCR engine.
 * Never throws; callers treat an unsolved challenge as an ordinary source failure.
 */
export class CaptchaSolver {
    constructor(
        private readonly http: AxiosInstance,
        private readonly ocr: IOcrEngine,
        private readonly tempDir: string = os.tmpdir()
    ) { }

    /**
     * Downloads the challenge with the session that was issued it, so the server
     * ties the answer to the right page, then solves it.
     */
    async solveFromUrl(url: string, session: SessionContext, signal?: AbortSignal): Promise<CaptchaSolution> {
        let image: Buffer;
        try {
            const response = await this.http.get<ArrayBuffer>(url, {
                headers: session.headers(),
                responseType: 'arraybuffer',
                signal,
            });
            session.absorb(response.headers['set-cookie']);
            image = Buffer.from(response.data);
        } catch (error) {
            console.warn('[CaptchaSolver] Failed to download the CAPTCHA:', describeHttpError(error));
            return { ok: false, reason: `download failed (${describeHttpError(error)})` };
        }
        return this.solveImage(image);
    }

    /**
     * Writes the image to a transient file for the OCR engine and always removes it afterwards.
     */
    async solveImage(image: Buffer): Promise<CaptchaSolution> {
        const imagePath = path.join(this.tempDir, `captcha_${uuidv4()}.jpg`);
        try {
            await fs.promises.writeFile(imagePath, image);
            const text = cleanCaptchaText(await this.ocr.recognize(imagePath));
            if (!text) {
                return { ok: false, reason: 'OCR returned no text' };
            }
            return { ok: true, text };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn('[CaptchaSolver] OCR failed:', message);
            return { ok: false, reason: `OCR failed (${message})` };
        } finally {
            await fs.promises.rm(imagePath, { force: true });
        }
    }
}
