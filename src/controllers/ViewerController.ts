import {
    Body,
    Delete,
    Get,
    JsonController,
    Post,
    Put,
    Req,
    Res,
} from 'routing-controllers';
import { Request, Response } from 'express';
import { IsBoolean, IsIn, IsNotEmpty, IsNumber, IsOptional, IsString } from 'class-validator';
import { Service } from 'typedi';
import { ViewerEventHub } from '../services/events/ViewerEventHub';
import { UiQueue } from '../services/queue/UiQueue';
import { ExportAdapter, ExportOutcome } from '../services/viewer/ExportAdapter';
import { MessageViewer } from '../services/viewer/MessageViewer';
import { RowHitTester } from '../services/viewer/RowHitTester';
import { DeletionOutcome } from '../services/viewer/DeletionGuard';
import { DisplayState, ListSnapshot } from '../types/display';

export class SelectionRequest {
    @IsOptional()
    @IsString()
    @IsNotEmpty()
    id?: string | null;
}

export class ToggleRequest {
    @IsString()
    @IsNotEmpty()
    id!: string;
}

const POINTER_PHASES = ['down', 'move', 'up'] as const;

export class PointerRequest {
    @IsIn([...POINTER_PHASES])
    phase!: (typeof POINTER_PHASES)[number];

    @IsNumber()
    x!: number;

    @IsNumber()
    y!: number;

    @IsOptional()
    @IsBoolean()
    overScrollControl?: boolean;

    @IsOptional()
    @IsNumber()
    scrollTop?: number;
}

@Service()
@JsonController('/api')
export class ViewerController {
    constructor(
        private readonly viewer: MessageViewer,
        private readonly events: ViewerEventHub,
        private readonly exporter: ExportAdapter,
        private readonly hitTester: RowHitTester,
        private readonly queue: UiQueue,
    ) {}

    @Get('/sse')
    stream(@Req() request: Request, @Res() response: Response): Response {
        this.events.addClient(request, response);
        return response;
    }

    @Get('/messages')
    listMessages(): ListSnapshot {
        return this.viewer.listSnapshot();
    }

    @Post('/refresh')
    async refresh(): Promise<ListSnapshot> {
        await this.viewer.refresh();
        return this.viewer.listSnapshot();
    }

    @Put('/selection')
    async select(@Body() body: SelectionRequest): Promise<{ selected: boolean; list: ListSnapshot }> {
        const selected = await this.viewer.select(body.id ?? null);
        return { selected, list: this.viewer.listSnapshot() };
    }

    @Post('/selection/toggle')
    async toggle(@Body() body: ToggleRequest): Promise<{ selected: boolean; list: ListSnapshot }> {
        const selected = await this.viewer.toggle(body.id);
        return { selected, list: this.viewer.listSnapshot() };
    }

    @Post('/selection/most-recent')
    async selectMostRecent(): Promise<ListSnapshot> {
        await this.viewer.selectMostRecent();
        return this.viewer.listSnapshot();
    }

    @Delete('/messages/selected')
    deleteSelected(): Promise<DeletionOutcome> {
        return this.viewer.deleteSelected();
    }

    @Get('/display')
    display(): DisplayState {
        return this.viewer.displaySnapshot();
    }

    @Post('/export/pointer')
    pointer(@Body() body: PointerRequest): Promise<ExportOutcome> {
        return this.queue.run(() => {
            if (typeof body.scrollTop === 'number') {
                this.hitTester.setScrollTop(body.scrollTop);
            }
            const point = { x: body.x, y: body.y };
            if (body.phase === 'down') {
                return this.exporter.pointerDown(point);
            }
            if (body.phase === 'up') {
                return this.exporter.pointerUp();
            }
            return this.exporter.pointerMove(point, { overScrollControl: body.overScrollControl });
        }, `pointer-${body.phase}`);
    }
}
