import {
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
} from 'class-validator';

export class StartSessionDto {
  @IsString()
  @IsNotEmpty()
  quizId!: string;

  @IsOptional()
  @IsBoolean()
  restart?: boolean;
}

export class SubmitAnswerDto {
  @IsString()
  @IsNotEmpty()
  questionId!: string;

  // Omitted when the question is skipped
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  answerId?: string;
}

export class SubmitAnswerMessageDto extends SubmitAnswerDto {
  @IsString()
  @IsNotEmpty()
  attemptId!: string;
}

export class RequestQuestionDto {
  @IsString()
  @IsNotEmpty()
  attemptId!: string;
}

export class StartQuizMessageDto {
  @IsString()
  @IsNotEmpty()
  quizId!: string;
}
