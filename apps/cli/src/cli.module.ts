import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { BenchmarkModule } from "./benchmark/benchmark.module.js";
import { configValidationSchema, loadConfig } from "./config/app.config.js";

@Module({
  imports: [
    ConfigModule.forRoot({
      load: [loadConfig],
      validationSchema: configValidationSchema,
      isGlobal: true,
    }),
    BenchmarkModule,
  ],
})
export class CliModule {}
