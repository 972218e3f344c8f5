import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });
  const logger = new Logger('Bootstrap');
  const config = app.get(ConfigService);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  // payment gateway callbacks arrive over RabbitMQ when a broker is configured
  const rabbitUrl = config.get<string>('rabbitmq.url');
  if (rabbitUrl) {
    app.connectMicroservice<MicroserviceOptions>({
      transport: Transport.RMQ,
      options: {
        urls: [rabbitUrl],
        queue: 'payment_callback_queue',
        queueOptions: {
          durable: true,
        },
        prefetchCount: 20,
      },
    });
    await app.startAllMicroservices();
    logger.log('Listening for payment callbacks on payment_callback_queue');
  }

  const port = config.get<number>('port', 3000);
  await app.listen(port);
  logger.log(`Back office listening on port ${port}`);
}
bootstrap().catch((error) => {
  console.error('Error during bootstrap:', error);
  process.exit(1);
});
process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
});
