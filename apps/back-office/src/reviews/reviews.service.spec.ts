import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { Product } from '../catalog/product.entity';
import {
  seedCategory,
  seedProduct,
  seedUser,
  testingInfrastructure,
} from '../testing/test-database';
import { User } from '../users/user.entity';
import { Review } from './review.entity';
import { ReviewsModule } from './reviews.module';
import { ReviewsService } from './reviews.service';

describe('ReviewsService', () => {
  let moduleRef: TestingModule;
  let reviews: ReviewsService;
  let dataSource: DataSource;
  let mug: Product;
  let users: User[];

  const productRating = async (): Promise<[number, number]> => {
    const product = await dataSource
      .getRepository(Product)
      .findOneByOrFail({ id: mug.id });
    return [product.rating, product.reviewCount];
  };

  const approvedReview = async (user: User, rating: number): Promise<Review> => {
    const review = await reviews.create({ productId: mug.id, userId: user.id, rating });
    return reviews.setApproval(review.id, true);
  };

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [...testingInfrastructure(), ReviewsModule],
    }).compile();
    // registers the @OnEvent listeners
    await moduleRef.init();

    reviews = moduleRef.get(ReviewsService);
    dataSource = moduleRef.get(DataSource);

    const kitchen = await seedCategory(dataSource);
    mug = await seedProduct(dataSource, kitchen.id);
    users = [];
    for (const name of ['ann', 'ben', 'cy']) {
      users.push(await seedUser(dataSource, { username: name, email: `${name}@example.com` }));
    }
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('holds new reviews for moderation', async () => {
    const review = await reviews.create({
      productId: mug.id,
      userId: users[0].id,
      rating: 5,
      comment: 'Keeps coffee warm',
    });

    expect(review.isApproved).toBe(false);
    expect(await productRating()).toEqual([0, 0]);
  });

  it('averages approved reviews to two decimals', async () => {
    await approvedReview(users[0], 4);
    await approvedReview(users[1], 5);
    await approvedReview(users[2], 4);

    expect(await productRating()).toEqual([4.33, 3]);
  });

  it('ignores reviews still waiting for approval', async () => {
    await approvedReview(users[0], 2);
    await approvedReview(users[1], 3);
    await reviews.create({ productId: mug.id, userId: users[2].id, rating: 5 });

    expect(await productRating()).toEqual([2.5, 2]);
  });

  it('recomputes when an approved review is edited or withdrawn', async () => {
    const first = await approvedReview(users[0], 5);
    await approvedReview(users[1], 4);

    await reviews.update(first.id, { rating: 1 });
    expect(await productRating()).toEqual([2.5, 2]);

    await reviews.setApproval(first.id, false);
    expect(await productRating()).toEqual([4, 1]);
  });

  it('drops soft-deleted reviews from the rating', async () => {
    const only = await approvedReview(users[0], 3);

    await reviews.remove(only.id, 'moderator-1');

    expect(await productRating()).toEqual([0, 0]);
    await expect(reviews.findOne(only.id)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('allows one review per user and product, deleted ones included', async () => {
    const review = await reviews.create({ productId: mug.id, userId: users[0].id, rating: 4 });
    await reviews.remove(review.id);

    await expect(
      reviews.create({ productId: mug.id, userId: users[0].id, rating: 2 }),
    ).rejects.toBeInstanceOf(ConflictException);
  });

  it('lists reviews by approval', async () => {
    const approved = await approvedReview(users[0], 4);
    await reviews.create({ productId: mug.id, userId: users[1].id, rating: 3 });

    const listed = await reviews.findAll({ productId: mug.id, isApproved: true });

    expect(listed.map(({ id }) => id)).toEqual([approved.id]);
  });
});
