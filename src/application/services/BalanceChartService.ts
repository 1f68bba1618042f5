import dayjs from 'dayjs';
import type { Account } from '../../domain/entities/Account.js';
import type { OperationKind } from '../../domain/entities/Operation.js';
import { EmptyHistoryError } from '../../domain/errors/BankingError.js';
import type { BalanceChartDTO, ChartPointDTO } from '../dto/BalanceChartDTO.js';

const pointColors: Record<OperationKind, ChartPointDTO['color']> = {
  deposit: 'green',
  withdraw: 'red',
  interest: 'blue',
};

/** Balance-over-time series with one annotated point per ledger entry. Drawing is up to the client. */
export class BalanceChartService {
  build(account: Account): BalanceChartDTO {
    const history = account.getHistory();

    if (history.length === 0) {
      throw new EmptyHistoryError(account.accountNumber);
    }

    return {
      title: `Balance history\nHolder: ${account.holder}`,
      xLabel: 'Operation time',
      yLabel: 'Balance',
      points: history.map((record) => {
        const sign = record.kind === 'withdraw' ? '-' : '+';

        return {
          timestamp: record.timestamp.toISOString(),
          label: dayjs(record.timestamp).format('DD.MM.YYYY HH:mm'),
          balance: record.balanceAfter,
          annotation: `${record.kind}\n${sign}${record.amount}`,
          color: pointColors[record.kind],
        };
      }),
    };
  }
}
