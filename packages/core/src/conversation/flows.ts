import type { FlowDefinition, FlowFields, FlowName } from './types.js'
import { date, optionalText, positiveId, stepsFor, text, time } from './steps.js'

type CreateFields = FlowFields['CREATE']
type EditFields = FlowFields['EDIT']
type DeleteFields = FlowFields['DELETE']
type InviteFields = FlowFields['INVITE']

const createStep = stepsFor<CreateFields>()
const editStep = stepsFor<EditFields>()
const deleteStep = stepsFor<DeleteFields>()
const inviteStep = stepsFor<InviteFields>()

const create: FlowDefinition<CreateFields> = {
  steps: [
    createStep('title', 'Enter the event title:', text('The title cannot be empty.')),
    createStep('date', 'Enter the date as YYYY-MM-DD:', date()),
    createStep('time', 'Enter the time as HH:MM (for example 14:30):', time()),
    createStep('details', 'Enter the event description:', text('The description cannot be empty.')),
  ],
  build: (d) =>
    d.title !== undefined && d.date !== undefined && d.time !== undefined && d.details !== undefined
      ? { title: d.title, date: d.date, time: d.time, details: d.details }
      : null,
}

const edit: FlowDefinition<EditFields> = {
  steps: [
    editStep('targetId', 'Enter the ID of the event to edit:', positiveId()),
    editStep('newDetails', 'Enter the new description:', text('The description cannot be empty.')),
  ],
  build: ({ targetId, newDetails }) =>
    targetId !== undefined && newDetails !== undefined ? { targetId, newDetails } : null,
}

const remove: FlowDefinition<DeleteFields> = {
  steps: [deleteStep('targetId', 'Enter the ID of the event to delete:', positiveId())],
  build: ({ targetId }) => (targetId !== undefined ? { targetId } : null),
}

const invite: FlowDefinition<InviteFields> = {
  steps: [
    inviteStep(
      'participant',
      'Enter the user ID of the person to invite:',
      positiveId('The participant must be a positive numeric user ID.'),
    ),
    inviteStep('targetEventId', 'Enter the ID of your event to meet about:', positiveId()),
    inviteStep(
      'details',
      'Enter meeting details, or "skip" to reuse the event description:',
      optionalText(),
    ),
  ],
  build: ({ participant, targetEventId, details }) =>
    participant !== undefined && targetEventId !== undefined && details !== undefined
      ? { participant, targetEventId, details }
      : null,
}

export const FLOWS: { [F in FlowName]: FlowDefinition<FlowFields[F]> } = {
  CREATE: create,
  EDIT: edit,
  DELETE: remove,
  INVITE: invite,
}
