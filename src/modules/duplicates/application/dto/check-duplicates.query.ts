import { IsIn, IsNumberString, IsOptional } from 'class-validator';

export class CheckDuplicatesQueryDto {
  @IsOptional()
  @IsNumberString({ no_symbols: true })
  limit?: string;

  @IsOptional()
  @IsNumberString({ no_symbols: true })
  startId?: string;

  @IsOptional()
  @IsIn(['true', 'false'])
  dryRun?: string;
}
