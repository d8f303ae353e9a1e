import express from "express";
import { createEventsController } from "../controllers/events";
import { eventErrorHandler } from "../middlewares/errorHandler";
import {
  EventRoute,
  type EventIngestionService,
} from "../services/eventIngestionService";

// Sidecars deliver CloudEvents as application/cloudevents+json
const parseEvent = express.json({
  type: ["application/json", "application/*+json"],
});

export const createEventsRouter = (
  events: EventIngestionService,
  pubsubName: string
) => {
  const controller = createEventsController(events, pubsubName);
  const router = express.Router();

  router.get("/subscriptions", controller.getSubscriptions);
  router.post(EventRoute.TopicEvent, parseEvent, controller.onTopicEvent);
  router.post(
    EventRoute.OrderCreationEvent,
    parseEvent,
    controller.onOrderCreationEvent
  );
  router.use(eventErrorHandler);

  return router;
};
