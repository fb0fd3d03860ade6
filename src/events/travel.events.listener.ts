import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  TRAVEL_EVENTS,
  type DestinationCreatedEvent,
  type DestinationDeletedEvent,
  type NoteCreatedEvent,
  type QuestionAnsweredEvent,
} from './travel.events';

const preview = (text: string) =>
  `${text.slice(0, 60)}${text.length > 60 ? '…' : ''}`;

@Injectable()
export class TravelEventsListener {
  private readonly logger = new Logger('TravelEvents');

  @OnEvent(TRAVEL_EVENTS.DESTINATION_CREATED)
  onDestinationCreated(event: DestinationCreatedEvent) {
    this.logger.log(`[destination.created] id=${event.destinationId} name="${event.name}"`);
  }

  @OnEvent(TRAVEL_EVENTS.DESTINATION_DELETED)
  onDestinationDeleted(event: DestinationDeletedEvent) {
    this.logger.log(
      `[destination.deleted] id=${event.destinationId} name="${event.name}" notes=[${event.removedNoteIds.join(', ')}]`,
    );
  }

  @OnEvent(TRAVEL_EVENTS.NOTE_CREATED)
  onNoteCreated(event: NoteCreatedEvent) {
    this.logger.log(
      `[note.created] id=${event.noteId} destination=${event.destinationId} text="${preview(event.content)}"`,
    );
  }

  @OnEvent(TRAVEL_EVENTS.QUESTION_ANSWERED)
  onQuestionAnswered(event: QuestionAnsweredEvent) {
    this.logger.log(
      `[question.answered] destination=${event.destinationId} mode=${event.mode} chunks=${event.chunksUsed} weather=${event.weatherConsulted} question="${preview(event.question)}"`,
    );
  }
}
