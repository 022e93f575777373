import 'reflect-metadata';
import { Container } from 'typedi';
import { createApp } from './app';
import { loadViewerConfig } from './config/viewerConfig';
import { describeError } from './errors/ViewerErrors';
import { ViewerEventHub } from './services/events/ViewerEventHub';
import { Logger } from './services/logging/Logger';
import { FileMessageRepository } from './services/repository/FileMessageRepository';
import { MessageViewer } from './services/viewer/MessageViewer';

async function main(): Promise<void> {
    const config = loadViewerConfig();
    const app = createApp(config);
    const logger = Container.get(Logger).child('server');

    const repository = Container.get(FileMessageRepository);
    const viewer = Container.get(MessageViewer);
    await viewer.start();
    if (config.watchMessages) {
        repository.start();
    }

    const server = app.listen(config.port, () => {
        logger.info(`Mail viewer listening on http://localhost:${config.port} (messages: ${repository.directory})`);
    });

    const shutdown = () => {
        logger.info('Shutting down');
        viewer.stop();
        repository.stop();
        Container.get(ViewerEventHub).closeAll();
        server.close();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
    console.error(`Failed to start mail viewer: ${describeError(error)}`);
    process.exitCode = 1;
});
