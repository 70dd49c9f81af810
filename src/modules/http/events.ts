import express, { Request, Response, Router } from 'express';

import { EventLog } from '../../utils/event-logger.js';
import { getPagination } from './utils.js';

export function createEventsRouter(events: EventLog): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /events Recent events
     * @apiName GetEvents
     * @apiGroup Events
     * @apiDescription Committed events held in memory, newest first
     *
     * @apiUse PaginationParams
     */
    router.get('/', (req: Request, res: Response) => {
        const { limit, skip } = getPagination(req);
        res.json({
            success: true,
            data: events.list(limit, skip),
            total: events.size,
            limit,
            skip,
        });
    });

    return router;
}
