import { Test } from '@nestjs/testing';
import { HealthCheckService } from './health-check.service';
import { HealthScoreService } from '../common/scoring/health-score.service';
import { healthQuestions } from '../common/config/health-questions';

describe('HealthCheckService', () => {
  let service: HealthCheckService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [HealthCheckService, HealthScoreService],
    }).compile();

    service = moduleRef.get(HealthCheckService);
  });

  it('fills unrated questions with the default rating', () => {
    const report = service.assess({});
    expect(Object.keys(report.ratings)).toHaveLength(10);
    expect(report.percentage).toBe(60);
    expect(report.label).toBe('Developing');
    expect(report.priorityIds).toEqual(['m4_q1', 'm4_q2', 'm4_q3']);
    expect(report.noCriticalGaps).toBe(false);
  });

  it('details each priority area with its action', () => {
    const report = service.assess({ m4_q4: 1, m4_q9: 2 });

    expect(report.percentage).toBe(54);
    expect(report.priorityIds).toEqual(['m4_q4', 'm4_q9', 'm4_q1']);
    expect(report.priorities[0]).toEqual({
      id: 'm4_q4',
      question: healthQuestions[3].text,
      radarLabel: 'Cost Management',
      score: 1,
      action: healthQuestions[3].action,
    });
    expect(report.labelData.badge).toBe('Good foundation, key gaps to address');
  });

  it('flags no critical gaps when every rating is at least 4', () => {
    const ratings = Object.fromEntries(healthQuestions.map((q) => [q.id, 4]));
    const report = service.assess(ratings);

    expect(report.percentage).toBe(80);
    expect(report.label).toBe('Strong');
    expect(report.noCriticalGaps).toBe(true);
  });
});
