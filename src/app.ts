import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import { useContainer, useExpressServer } from 'routing-controllers';
import { Container } from 'typedi';
import { ViewerConfig, ViewerConfigToken } from './config/viewerConfig';
import { ViewerController } from './controllers/ViewerController';
import { NotificationPublisherToken, ViewerEventHub } from './services/events/ViewerEventHub';
import { ContentLoaderToken } from './services/loader/ContentLoader';
import { MimeContentLoader } from './services/loader/MimeContentLoader';
import { Logger } from './services/logging/Logger';
import { FileMessageRepository } from './services/repository/FileMessageRepository';
import { MessageRepositoryToken } from './services/repository/MessageRepository';
import { EntryHitTesterToken, FileDropSinkToken } from './services/viewer/ExportAdapter';
import { ListSynchronizer } from './services/viewer/ListSynchronizer';
import { RowHitTester } from './services/viewer/RowHitTester';
import { SelectionLoadCoordinator } from './services/viewer/SelectionLoadCoordinator';

useContainer(Container);

export function configureContainer(config: ViewerConfig): void {
    Container.set(ViewerConfigToken, config);
    Container.set(Logger, new Logger({ level: config.logLevel }));

    Container.set(MessageRepositoryToken, Container.get(FileMessageRepository));
    Container.set(ContentLoaderToken, Container.get(MimeContentLoader));

    const events = Container.get(ViewerEventHub);
    Container.set(NotificationPublisherToken, events);
    Container.set(FileDropSinkToken, events);
    Container.set(EntryHitTesterToken, Container.get(RowHitTester));

    Container.get(ListSynchronizer).onChanged((snapshot) => events.emitListChanged(snapshot));
    Container.get(SelectionLoadCoordinator).onDisplayChanged((state) => events.emitDisplayChanged(state));
}

export function createApp(config: ViewerConfig): express.Express {
    configureContainer(config);

    const app = express();

    app.use(cors());
    app.use('/render', express.static(config.scratchDir));

    useExpressServer(app, {
        controllers: [ViewerController],
        validation: {
            whitelist: true,
            forbidNonWhitelisted: true,
            validationError: { target: false },
        },
        classTransformer: true,
    });

    return app;
}
