import { Controller, Get } from '@nestjs/common';
import { DataSource } from 'typeorm';

@Controller('health')
export class HealthController {
  constructor(private dataSource: DataSource) {}

  /**
   * 헬스 체크
   * DB 연결 상태 포함
   */
  @Get()
  async check() {
    if (!this.dataSource.isInitialized) {
      return {
        status: 'unhealthy',
        database: 'disconnected',
        timestamp: new Date().toISOString(),
      };
    }

    try {
      await this.dataSource.query('SELECT 1');
    } catch {
      return {
        status: 'unhealthy',
        database: 'unreachable',
        timestamp: new Date().toISOString(),
      };
    }

    return {
      status: 'healthy',
      database: 'connected',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    };
  }
}
