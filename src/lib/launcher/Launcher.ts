// File: src/lib/launcher/Launcher.ts
import open from 'open'; // v8, the last CommonJS major
import chalk from 'chalk';

/**
 * Platform hand-off for "show me this folder" and "play this file".
 * Callers only learn that the request was issued, not what the desktop did with it.
 */
export interface Launcher {
    openInFileManager(targetPath: string): Promise<void>;
    openWithDefaultApplication(targetPath: string): Promise<void>;
}

/**
 * `open` picks `explorer`, `open` or `xdg-open` for the running platform.
 * A directory target opens the file manager; a file opens in its default app.
 */
export class DesktopLauncher implements Launcher {
    async openInFileManager(targetPath: string): Promise<void> {
        await this.launch(targetPath);
    }

    async openWithDefaultApplication(targetPath: string): Promise<void> {
        await this.launch(targetPath);
    }

    private async launch(targetPath: string): Promise<void> {
        const child = await open(targetPath, { wait: false });
        // Don't keep the CLI alive for the viewer's lifetime.
        child.unref();
        child.on('error', (error) => {
            console.warn(chalk.yellow(`Launcher reported an error for ${targetPath}:`), error.message);
        });
    }
}
