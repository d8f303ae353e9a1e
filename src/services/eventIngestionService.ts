import type {
  InsertOutcome,
  ProductVariantRepository,
  UserRepository,
} from "../repositories/types";
import { UnroutableEventError } from "../utils/errors";
import { getLogger } from "../utils/logger";

const log = getLogger("events");

export const Topic = {
  ProductVariantCreated: "catalog/product-variant/created",
  UserCreated: "user/user/created",
  OrderCreated: "order/order/created",
} as const;

export const EventRoute = {
  TopicEvent: "/on-topic-event",
  OrderCreationEvent: "/on-order-creation-event",
} as const;

export interface Subscription {
  pubsubName: string;
  topic: string;
  route: string;
}

/** Relevant part of an event delivered by the bus. */
export interface TopicEvent<Data> {
  topic: string;
  data: Data;
}

export interface EntityCreatedData {
  id: string;
}

export interface OrderItemEventData {
  shoppingCartItemId: string;
  count: number;
}

export interface OrderCreatedData {
  id: string;
  userId: string;
  orderItems: OrderItemEventData[];
}

export const listSubscriptions = (pubsubName: string): Subscription[] => [
  { pubsubName, topic: Topic.UserCreated, route: EventRoute.TopicEvent },
  {
    pubsubName,
    topic: Topic.ProductVariantCreated,
    route: EventRoute.TopicEvent,
  },
  {
    pubsubName,
    topic: Topic.OrderCreated,
    route: EventRoute.OrderCreationEvent,
  },
];

/**
 * Applies bus events to the local projection. Events are authoritative and
 * may arrive more than once and in any order, so every handler tolerates
 * redelivery.
 */
export class EventIngestionService {
  constructor(
    private readonly users: UserRepository,
    private readonly productVariants: ProductVariantRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async handleTopicEvent(event: TopicEvent<EntityCreatedData>): Promise<void> {
    switch (event.topic) {
      case Topic.ProductVariantCreated: {
        const outcome = await this.productVariants.insert(event.data.id);
        this.logOutcome("product variant", event.data.id, outcome);
        return;
      }
      case Topic.UserCreated: {
        const outcome = await this.users.insert(event.data.id, this.now());
        this.logOutcome("user", event.data.id, outcome);
        return;
      }
      default:
        throw new UnroutableEventError(event.topic);
    }
  }

  /** Removes the ordered items from the owner's cart. */
  async handleOrderCreationEvent(
    event: TopicEvent<OrderCreatedData>
  ): Promise<void> {
    if (event.topic !== Topic.OrderCreated) {
      throw new UnroutableEventError(event.topic);
    }
    const { id, userId, orderItems } = event.data;
    const itemIds = orderItems.map((orderItem) => orderItem.shoppingCartItemId);
    await this.users.pullCartItems(userId, itemIds, this.now());
    log.info("Removed ordered shopping cart items", {
      orderId: id,
      userId,
      itemIds,
    });
  }

  private logOutcome(
    entity: string,
    id: string,
    outcome: InsertOutcome
  ): void {
    if (outcome === "duplicate") {
      log.info(`${entity} already present, ignoring redelivery`, { id });
    } else {
      log.info(`Added ${entity}`, { id });
    }
  }
}
