import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { DOMAIN_EVENTS, ReviewChangedEvent } from '@app/common';
import { ReviewsService } from './reviews.service';

@Injectable()
export class ProductRatingListener {
  constructor(private readonly reviewsService: ReviewsService) {}

  @OnEvent(DOMAIN_EVENTS.REVIEW_CHANGED)
  async handleReviewChanged(event: ReviewChangedEvent): Promise<void> {
    await this.reviewsService.recomputeProductRating(event.productId);
  }
}
