import { HttpModule } from "@nestjs/axios";
import { Module } from "@nestjs/common";
import { ProbeService } from "./probe.service.js";

@Module({
  imports: [HttpModule],
  providers: [ProbeService],
  exports: [ProbeService],
})
export class ProbeModule {}
