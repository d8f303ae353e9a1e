import { Request, Response, NextFunction } from "express";
import {
  type EventIngestionService,
  listSubscriptions,
} from "../services/eventIngestionService";
import { getLogger } from "../utils/logger";
import {
  orderCreationEventSchema,
  topicEventSchema,
} from "../validation/events";

const log = getLogger("events");

// Acknowledgement the bus expects on success
const TOPIC_EVENT_OK = { status: 0 } as const;

export const createEventsController = (
  events: EventIngestionService,
  pubsubName: string
) => ({
  getSubscriptions: (_req: Request, res: Response) => {
    res.json(listSubscriptions(pubsubName));
  },

  onTopicEvent: async (req: Request, res: Response, next: NextFunction) => {
    try {
      log.info("Received topic event", { event: req.body });
      await events.handleTopicEvent(topicEventSchema.parse(req.body));
      res.json(TOPIC_EVENT_OK);
    } catch (error) {
      next(error);
    }
  },

  onOrderCreationEvent: async (
    req: Request,
    res: Response,
    next: NextFunction
  ) => {
    try {
      log.info("Received order creation event", { event: req.body });
      await events.handleOrderCreationEvent(
        orderCreationEventSchema.parse(req.body)
      );
      res.json(TOPIC_EVENT_OK);
    } catch (error) {
      next(error);
    }
  },
});
