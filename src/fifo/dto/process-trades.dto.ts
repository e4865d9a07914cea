import { IsArray, IsIn, IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';
import { COST_BASES, CostBasis, OUT_OF_ORDER_POLICIES, OutOfOrderPolicy } from '../../config/app.config';
import { RawTradeRow } from '../entities/trade-record.entity';

// Per-request overrides of the configured matching options.
export class FifoOptionsDto {
  @IsOptional()
  @IsIn(OUT_OF_ORDER_POLICIES)
  outOfOrderPolicy?: OutOfOrderPolicy;

  @IsOptional()
  @IsIn(COST_BASES)
  costBasis?: CostBasis;
}

// Rows keep their raw shape; each one is validated by the normalizer
// so a bad row is dropped instead of failing the request.
export class ProcessTradesDto extends FifoOptionsDto {
  @IsArray()
  @IsObject({ each: true })
  trades!: RawTradeRow[];
}

// Whole trade file as CSV text (ClientCode,TradeDate,Segment,ScripName,...).
export class ProcessCsvDto extends FifoOptionsDto {
  @IsString()
  @IsNotEmpty()
  csv!: string;
}
