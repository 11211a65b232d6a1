import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { NotFoundError } from '../common/exceptions/domain.exceptions';
import { Project } from './entities/project.entity';

@Injectable()
export class ProjectsService {
  constructor(
    @InjectRepository(Project)
    private readonly projectRepository: Repository<Project>,
  ) {}

  async findById(projectId: string): Promise<Project> {
    const project = await this.projectRepository.findOne({ where: { id: projectId } });
    if (!project) throw new NotFoundError('Project', projectId);
    return project;
  }

  findByDeadlineBatch(batchId: string): Promise<Project[]> {
    return this.projectRepository.find({ where: { deadlineBatchId: batchId } });
  }

  isMember(project: Project, userId: string): boolean {
    return project.memberIds.includes(userId) || project.leaderId === userId;
  }

  isLeader(project: Project, userId: string): boolean {
    return project.leaderId !== null && project.leaderId === userId;
  }

  isSupervisor(project: Project, userId: string): boolean {
    return project.supervisorId !== null && project.supervisorId === userId;
  }

  /** Students of the group, leader first, without duplicates. */
  studentIds(project: Project): string[] {
    const ids = project.leaderId ? [project.leaderId, ...project.memberIds] : [...project.memberIds];
    return [...new Set(ids.filter((id) => id.length > 0))];
  }
}
