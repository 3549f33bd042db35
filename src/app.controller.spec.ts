import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { AppController, SERVICE_ENDPOINTS } from './app.controller';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        { provide: ConfigService, useValue: { get: () => 'production' } },
      ],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should describe the service', () => {
    expect(controller.getInfo()).toEqual({
      success: true,
      message: 'SCADA Flow Meter API',
      status: 'running',
      version: '1.0.0',
      environment: 'production',
      endpoints: SERVICE_ENDPOINTS,
    });
  });

  it('should list the upload endpoint', () => {
    expect(SERVICE_ENDPOINTS.upload_data).toBe('POST /api/flowmeter/upload');
  });
});
