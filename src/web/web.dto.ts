import { IsString } from 'class-validator';

export class DestinationFormDto {
  @IsString()
  name!: string;
}

export class NoteFormDto {
  @IsString()
  destination!: string;

  @IsString()
  content!: string;
}

export class QuestionFormDto {
  @IsString()
  destination!: string;

  @IsString()
  question!: string;
}

export class ClearChatFormDto {
  @IsString()
  destination!: string;
}
