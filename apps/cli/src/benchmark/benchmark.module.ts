import { Module } from "@nestjs/common";
import { ProbeModule } from "../probe/probe.module.js";
import { BenchmarkService } from "./benchmark.service.js";

@Module({
  imports: [ProbeModule],
  providers: [BenchmarkService],
  exports: [BenchmarkService],
})
export class BenchmarkModule {}
