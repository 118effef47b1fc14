import { execFile } from 'child_process';
import { promisify } from 'util';
import { IOcrEngine } from '../../domain/ports/IOcrEngine';

const execFileAsync = promisify(execFile);

/**
 * OCR through the tesseract command line tool, which must be installed on the host.
 */
export class TesseractOcrEngine implements IOcrEngine {
    constructor(
        private readonly binaryPath: string = 'tesseract',
        private readonly timeoutMs: number = 15000
    ) { }

    async recognize(imagePath: string): Promise<string> {
        const { stdout } = await execFileAsync(this.binaryPath, [imagePath, 'stdout'], {
            timeout: this.timeoutMs,
        });
        return stdout;
    }
}
