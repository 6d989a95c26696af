import { Controller, Get, Logger } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { describeError } from '../common/errors';

interface HealthCheckResult {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  checks: {
    database: boolean;
  };
  version: string;
}

@SkipThrottle()
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  @Get()
  async check(): Promise<HealthCheckResult> {
    const checks = {
      database: await this.checkDatabase(),
    };

    const allHealthy = Object.values(checks).every((check) => check);

    return {
      status: allHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks,
      version: process.env.npm_package_version || '1.0.0',
    };
  }

  @Get('ready')
  async ready(): Promise<{ ready: boolean }> {
    // Ready once the conversation store answers
    return { ready: await this.checkDatabase() };
  }

  @Get('live')
  live(): { alive: boolean } {
    return { alive: true };
  }

  private async checkDatabase(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error(`Database health check failed: ${describeError(error)}`);
      return false;
    }
  }
}
