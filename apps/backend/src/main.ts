import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableCors({ origin: true });

  const cfg = new DocumentBuilder()
    .setTitle("Lunisolar Calendar API")
    .setDescription("Gregorian to Chinese lunisolar conversion, solar terms and festivals")
    .setVersion("0.1.0")
    .build();
  const doc = SwaggerModule.createDocument(app, cfg);
  SwaggerModule.setup("docs", app, doc);

  const port = Number(process.env.PORT) || 3000;
  await app.listen(port);
  Logger.log(`Server is running on port ${port}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    error instanceof Error ? error.stack ?? error.message : String(error),
    "Bootstrap"
  );
  process.exit(1);
});
