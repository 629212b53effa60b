import { Module } from '@nestjs/common';
import { Pool, PoolConfig } from 'pg';
import { DDL_ARCHITECT_CONFIG, loadConfig } from '../config';
import { ApplyCommand } from './commands/apply.command';
import { EstimateCommand } from './commands/estimate.command';
import { FormatCommand } from './commands/format.command';
import { OptimizeCommand } from './commands/optimize.command';
import { OrderCommand } from './commands/order.command';
import { SimulateCommand } from './commands/simulate.command';
import { ValidateCommand } from './commands/validate.command';
import {
  DatabaseService,
  POOL_FACTORY,
  PoolFactory,
} from './services/database.service';
import { DdlOptimizerService } from './services/ddl-optimizer.service';
import { DdlParserService } from './services/ddl-parser.service';
import { DependencyResolverService } from './services/dependency-resolver.service';
import { DmlSimulatorService } from './services/dml-simulator.service';
import { InputService } from './services/input.service';
import { PerformanceEstimatorService } from './services/performance-estimator.service';
import { ResponseFormatterService } from './services/response-formatter.service';
import { SchemaValidatorService } from './services/schema-validator.service';

const createPool: PoolFactory = (config: PoolConfig) => new Pool(config);

@Module({
  providers: [
    {
      provide: DDL_ARCHITECT_CONFIG,
      useFactory: () => loadConfig(process.env),
    },
    {
      provide: POOL_FACTORY,
      useValue: createPool,
    },
    DdlParserService,
    DependencyResolverService,
    PerformanceEstimatorService,
    DdlOptimizerService,
    SchemaValidatorService,
    DmlSimulatorService,
    ResponseFormatterService,
    DatabaseService,
    InputService,
    OrderCommand,
    FormatCommand,
    EstimateCommand,
    OptimizeCommand,
    ValidateCommand,
    SimulateCommand,
    ApplyCommand,
  ],
})
export class DdlArchitectModule {}
