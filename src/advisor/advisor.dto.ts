import { IsInt, IsString } from 'class-validator';

export class AskDto {
  @IsInt()
  destination_id!: number;

  @IsString()
  question!: string;
}
