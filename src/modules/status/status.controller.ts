import { Controller, Get } from '@nestjs/common';
import { StatusResponse, StatusService } from './status.service';

@Controller('api/status')
export class StatusController {
  constructor(private readonly statusService: StatusService) {}

  @Get()
  getStatus(): StatusResponse {
    return this.statusService.getStatus();
  }
}
