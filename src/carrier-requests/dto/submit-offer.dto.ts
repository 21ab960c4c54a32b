import { Type } from 'class-transformer';
import {
  IsDate,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  MaxLength,
  Min,
} from 'class-validator';

export class SubmitOfferDto {
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  offeredPrice!: number;

  @Type(() => Date)
  @IsDate()
  @IsOptional()
  offeredDeliveryDate?: Date;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  @IsOptional()
  transportType?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  @IsOptional()
  vehicleType?: string;

  @IsString()
  @Length(2, 5)
  @IsOptional()
  driverLanguage?: string;

  @IsString()
  @MaxLength(2000)
  @IsOptional()
  notes?: string;
}
