import { firstUnconfirmedField } from '../memory/confirmed-fields';
import { DiscussionTopic, WorkflowStage } from '../memory/enums';
import type { ConfirmableField, SessionState, WorkflowProgress } from '../memory/types';

const FIELD_TOPICS: Record<ConfirmableField, DiscussionTopic> = {
  date: DiscussionTopic.CONFIRMING_DATE,
  time: DiscussionTopic.CONFIRMING_TIME,
  partySize: DiscussionTopic.CONFIRMING_PARTY_SIZE,
  specialRequests: DiscussionTopic.CONFIRMING_SPECIAL_REQUESTS,
  contactName: DiscussionTopic.CONFIRMING_CONTACT_DETAILS,
  contactPhone: DiscussionTopic.CONFIRMING_CONTACT_DETAILS,
  occasion: DiscussionTopic.CONFIRMING_OCCASION,
};

const STAGE_TOPICS: Record<WorkflowStage, DiscussionTopic> = {
  [WorkflowStage.INTRO]: DiscussionTopic.GREETING,
  [WorkflowStage.SHARE_PREFERENCES]: DiscussionTopic.CONFIRMING_AVAILABILITY,
  [WorkflowStage.AWAIT_AVAILABILITY]: DiscussionTopic.CONFIRMING_AVAILABILITY,
  [WorkflowStage.REVIEW_ALTERNATIVES]: DiscussionTopic.CONFIRMING_AVAILABILITY,
  [WorkflowStage.PROVIDE_CONTACT]: DiscussionTopic.CONFIRMING_CONTACT_DETAILS,
  [WorkflowStage.MENU_DISCUSSION]: DiscussionTopic.MENU_DISCUSSION,
  [WorkflowStage.AWAIT_CONFIRMATION]: DiscussionTopic.CONFIRMATION,
  [WorkflowStage.SAVE_DATA]: DiscussionTopic.CLOSING,
  [WorkflowStage.WRAP_UP]: DiscussionTopic.CLOSING,
  [WorkflowStage.END]: DiscussionTopic.NONE,
};

/**
 * Current conversational focus as a pure projection of the workflow cursor.
 */
export function deriveTopic(
  workflow: Pick<WorkflowProgress, 'blockingIssue' | 'stage' | 'confirmedFields'>
): DiscussionTopic {
  if (workflow.blockingIssue) {
    return DiscussionTopic.ERROR_RECOVERY;
  }

  if (workflow.stage === WorkflowStage.PROVIDE_CONTACT) {
    const next = firstUnconfirmedField(workflow.confirmedFields);
    return next ? FIELD_TOPICS[next] : DiscussionTopic.CONFIRMING_CONTACT_DETAILS;
  }

  return STAGE_TOPICS[workflow.stage] ?? DiscussionTopic.NONE;
}

/**
 * Recomputes `currentTopic` on a working copy. Every handler ends with this;
 * nothing else writes the topic.
 */
export function syncTopic(state: SessionState): void {
  state.workflow.currentTopic = deriveTopic(state.workflow);
}
