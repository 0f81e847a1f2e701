import { PDFParse } from "pdf-parse";

export interface PdfDocument {
    readonly pageCount: number;
    /** 1-based page number. */
    readPage(pageNumber: number): Promise<string>;
    close(): Promise<void>;
}

export type PdfOpener = (data: Uint8Array) => Promise<PdfDocument>;

export const openPdfDocument: PdfOpener = async (data) => {
    // pdf.js takes ownership of the buffer it is handed.
    const parser = new PDFParse({ data: new Uint8Array(data) });

    try {
        const info = await parser.getInfo();
        return {
            pageCount: info.total,
            readPage: async (pageNumber: number) => {
                const result = await parser.getText({ partial: [pageNumber] });
                return result.pages.map((page) => page.text).join("\n");
            },
            close: () => parser.destroy(),
        };
    } catch (error) {
        await parser.destroy();
        throw error;
    }
};
