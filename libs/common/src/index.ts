export * from './config/configuration';
export * from './constants/choices';
export * from './constants/events';
export * from './constants/patterns';
export * from './constants/transitions';
export * from './database/database.module';
export * from './database/numeric.transformer';
export * from './decorators/actor.decorator';
export * from './dto/audit.dto';
export * from './dto/cart.dto';
export * from './dto/catalog.dto';
export * from './dto/coupon.dto';
export * from './dto/order.dto';
export * from './dto/payment.dto';
export * from './dto/review.dto';
export * from './dto/user.dto';
export * from './localization/is-localized-text.decorator';
export * from './localization/localized-text';
export * from './pricing/pricing';
