import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { LoggingService } from '../../common/monitoring/logging.service';
import { PrometheusService } from '../../common/monitoring/prometheus.service';
import { describeAmount } from '../../common/money/money';
import { CreateAccountCommand } from '../commands/impl/create-account.command';
import { AccountEntity } from '../models/account.entity';
import { GetAccountQuery } from '../queries/impl/get-account.query';
import {
  AccountCreationResponse,
  AccountResponse,
  toAccountCreationResponse,
  toAccountResponse,
} from './dtos/account.response';
import { CreateAccountDto } from './dtos/create-account.dto';

// Typed failures are mapped to status codes by BankingExceptionFilter
@Controller('accounts')
export class AccountsController {
  constructor(
    private readonly commandBus: CommandBus,
    private readonly queryBus: QueryBus,
    private readonly loggingService: LoggingService,
    private readonly prometheusService: PrometheusService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createAccount(
    @Body() createAccountDto: CreateAccountDto,
  ): Promise<AccountCreationResponse> {
    this.loggingService.logRoute('POST /accounts', 'POST', {
      account_id: createAccountDto.account_id,
      initial_balance: describeAmount(createAccountDto.initial_balance),
    });
    this.prometheusService
      .getCounter('api_requests_total')
      .inc(
        { path: '/accounts', method: 'POST', operation: 'create_account' },
        1,
      );

    const account = await this.commandBus.execute<
      CreateAccountCommand,
      AccountEntity
    >(
      new CreateAccountCommand(
        createAccountDto.account_id,
        createAccountDto.initial_balance,
      ),
    );

    return toAccountCreationResponse(account);
  }

  @Get(':accountId')
  async getAccount(
    @Param('accountId') accountId: string,
  ): Promise<AccountResponse> {
    this.loggingService.logRoute(`GET /accounts/${accountId}`, 'GET', {
      accountId,
    });
    this.prometheusService
      .getCounter('api_requests_total')
      .inc(
        { path: '/accounts/:accountId', method: 'GET', operation: 'get_account' },
        1,
      );

    const account = await this.queryBus.execute<GetAccountQuery, AccountEntity>(
      new GetAccountQuery(accountId),
    );

    return toAccountResponse(account);
  }
}
