import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe, type INestApplication } from '@nestjs/common';
import { AppModule } from './app.module';

type CorsOriginCallback = (err: Error | null, allow?: boolean) => void;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { cors: false });

  // http(s)://localhost:<any>, 127.0.0.1 and [::1]
  const localhostOrigin =
    /^https?:\/\/(localhost|\[::1\]|127\.0\.0\.1)(:\d+)?$/;

  app.enableCors({
    origin(origin: string | undefined, cb: CorsOriginCallback): void {
      // server-to-server and curl send no Origin
      if (origin == null) {
        cb(null, true);
        return;
      }
      if (localhostOrigin.test(origin)) {
        cb(null, true);
        return;
      }
      cb(new Error(`CORS: origin not allowed → ${String(origin)}`));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: false,
    maxAge: 86_400,
  });

  configureApp(app);

  const port = process.env.PORT ? Number(process.env.PORT) : 3000;
  await app.listen(port);
  new Logger('Bootstrap').log(`listening on :${port}`);
}

/** Prefix and validation shared by the server and the HTTP specs. */
export function configureApp(app: INestApplication): void {
  app.setGlobalPrefix('api');
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );
}

if (require.main === module) {
  void bootstrap();
}
