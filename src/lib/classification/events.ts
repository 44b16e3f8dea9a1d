import { EventBus } from '@/lib/utils/event-bus';
import type { ReviewEvents } from './types';

export const reviewEvents = new EventBus<ReviewEvents>();
