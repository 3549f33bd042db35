import { Module } from '@nestjs/common';
import { FlowmeterController } from './controllers/flowmeter.controller';
import { FlowMeterReadingRepository } from './repositories/flow-meter-reading.repository';
import { FlowmeterService } from './services/flowmeter.service';

@Module({
  controllers: [FlowmeterController],
  providers: [FlowmeterService, FlowMeterReadingRepository],
})
export class FlowmeterModule {}
