/**
 * Report endpoints, mounted at /report
 *
 * Listings default to unarchived reports; /archived lists the rest.
 * POST /report/archive moves a report to the archived state.
 */

import { Router } from 'express';
import type { Stores } from '../../storage/index.js';
import { badRequest, created, notFound, ok, respond } from '../responses.js';
import { archiveRequestSchema, parseIdParam, reportSubmissionSchema } from '../schemas.js';

export function createReportRouter({ db, machines, reports }: Stores): Router {
  const router = Router();

  const requireReport = (reportId: number): void => {
    if (!reports.exists(reportId)) {
      throw notFound(`Report id ${reportId} was not found.`);
    }
  };

  router.get('/', respond(() => ok(reports.list({ archived: false }))));

  router.get('/archived', respond(() => ok(reports.list({ archived: true }))));

  router.get('/:reportId', respond((req) => {
    const reportId = parseIdParam(req.params.reportId, 'report id');
    const report = reports.get(reportId);
    if (!report) {
      throw notFound(`The report id ${reportId} was not found.`);
    }
    return ok(report);
  }));

  // Submit a report against a machine in a room. The reporter is checked by
  // the schema's foreign key, so constraint failures here are the client's.
  router.post('/', respond((req) => {
    const submission = reportSubmissionSchema.parse(req.body);
    const report = db.transaction(() => {
      if (!machines.exists(submission.room_id, submission.machine_id)) {
        throw badRequest(
          `Room id ${submission.room_id} does not contain machine id ${submission.machine_id}.`
        );
      }
      return reports.create(submission);
    });
    return created(report);
  }, { constraintStatus: 400 }));

  router.post('/archive', respond((req) => {
    const { report_id: reportId } = archiveRequestSchema.parse(req.body);
    const report = db.transaction(() => {
      requireReport(reportId);
      return reports.archive(reportId);
    });
    if (!report) {
      throw notFound(`Report id ${reportId} was not found.`);
    }
    return ok(report);
  }));

  router.delete('/:reportId', respond((req) => {
    const reportId = parseIdParam(req.params.reportId, 'report id');
    const report = db.transaction(() => {
      requireReport(reportId);
      return reports.delete(reportId);
    });
    if (!report) {
      throw notFound(`Report id ${reportId} was not found.`);
    }
    return ok(report);
  }));

  return router;
}
