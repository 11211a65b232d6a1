import { DeadlineBatch } from '../deadlines/entities/deadline-batch.entity';
import { ProjectDeadline } from '../deadlines/entities/project-deadline.entity';
import { DocumentType } from '../document-types/entities/document-type.entity';
import { Log } from '../logs/logs.entity';
import { EvaluationMarks } from '../marking/entities/evaluation-marks.entity';
import { SupervisorMarks } from '../marking/entities/supervisor-marks.entity';
import { Notification } from '../notifications/entities/notification.entity';
import { Project } from '../projects/entities/project.entity';
import { FinalResult } from '../results/entities/final-result.entity';
import { SystemSetting } from '../settings/entities/system-setting.entity';
import { DocumentSubmission } from '../submissions/entities/document-submission.entity';

export const ENTITIES = [
  Project,
  DocumentType,
  DeadlineBatch,
  ProjectDeadline,
  DocumentSubmission,
  SupervisorMarks,
  EvaluationMarks,
  FinalResult,
  Notification,
  Log,
  SystemSetting,
];
