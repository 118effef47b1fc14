/**
 * Black-box OCR: reads the text printed in an image file.
 */
export interface IOcrEngine {
    recognize(imagePath: string): Promise<string>;
}
