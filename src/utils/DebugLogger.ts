import fs from 'fs';
import path from 'path';

class DebugLogger {
    private static logFilePath: string | null = null;
    private static maxFileSize = 1024 * 1024 * 5; // 5MB

    /**
     * Enables file tracing. Without a path every call to `log` is a no-op.
     */
    static configure(filePath: string | undefined) {
        this.logFilePath = filePath ? path.resolve(filePath) : null;
    }

    static log(message: string, data?: unknown) {
        const logFilePath = this.logFilePath;
        if (!logFilePath) return;

        const timestamp = new Date().toISOString();
        const logMessage = `[${timestamp}] ${message}\n${
            data !== undefined ? JSON.stringify(data, null, 2) : ''
        }\n\n`;

        // Check file size and rotate if needed
        if (fs.existsSync(logFilePath)) {
            const stats = fs.statSync(logFilePath);
            if (stats.size > this.maxFileSize) {
                this.rotateLogFile(logFilePath);
            }
        } else {
            fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
        }

        fs.appendFileSync(logFilePath, logMessage);
    }

    private static rotateLogFile(logFilePath: string) {
        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        const { dir, name, ext } = path.parse(logFilePath);
        fs.renameSync(logFilePath, path.join(dir, `${name}_${timestamp}${ext}`));
    }
}

export default DebugLogger;
