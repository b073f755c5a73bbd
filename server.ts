import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import * as fs from 'fs';
import { DocxParserError, iterateParagraphs, parseDocument, type SemanticBlock, type WordDocument } from './parser';
import { loadConfig, type AppConfig } from './config';

function countParagraphs(document: WordDocument): number {
    let count = 0;
    for (const _paragraph of document.paragraphs()) count++;
    for (const footnote of document.footnotes) {
        for (const _paragraph of iterateParagraphs(footnote.children)) count++;
    }
    return count;
}

function countByType(blocks: SemanticBlock[]): Record<string, number> {
    const counts: Record<string, number> = {};
    blocks.forEach(block => {
        counts[block.type] = (counts[block.type] || 0) + 1;
    });
    return counts;
}

async function removeUpload(filePath: string): Promise<void> {
    try {
        await fs.promises.unlink(filePath);
    } catch (error) {
        console.warn(`[server] Could not remove uploaded file ${filePath}:`, error);
    }
}

export function createApp(config: AppConfig = loadConfig()): express.Express {
    const app = express();

    // Configure multer for file uploads
    const upload = multer({
        dest: config.uploadDir,
        limits: { fileSize: config.maxUploadBytes }
    });

    // Request logging middleware
    app.use((req: Request, res: Response, next: NextFunction) => {
        console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
        next();
    });

    // Test endpoint to verify server is working
    app.get('/api/test', (req: Request, res: Response) => {
        res.json({ message: 'Server is working', timestamp: new Date().toISOString() });
    });

    // Upload a document and return its classified paragraphs
    app.post('/api/paragraphs', upload.single('document'), async (req: Request, res: Response, next: NextFunction) => {
        if (!req.file) {
            res.status(400).json({ error: 'No file uploaded' });
            return;
        }

        const filePath = req.file.path;
        try {
            const buffer = await fs.promises.readFile(filePath);
            const { document, semantic } = await parseDocument(buffer, { debug: config.debug });

            res.json({
                success: true,
                blocks: semantic,
                summary: {
                    totalParagraphs: countParagraphs(document),
                    semanticBlocks: semantic.length,
                    counts: countByType(semantic)
                }
            });
        } catch (error) {
            next(error);
        } finally {
            await removeUpload(filePath);
        }
    });

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof multer.MulterError) {
            const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
            res.status(status).json({ error: error.message });
            return;
        }
        if (error instanceof DocxParserError) {
            console.warn(`[server] Rejected document: ${error.message}`);
            res.status(422).json({ error: error.message, type: error.name });
            return;
        }
        console.error('[server] Error processing document:', error);
        res.status(500).json({
            error: 'Failed to process document',
            details: error instanceof Error ? error.message : String(error)
        });
    });

    return app;
}

export function startServer(config: AppConfig = loadConfig()) {
    const app = createApp(config);
    return app.listen(config.port, () => {
        console.log(`Server running on http://localhost:${config.port}`);
    });
}

if (require.main === module) {
    startServer();
}
