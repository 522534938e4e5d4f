import { createLatestCommand } from '@/services/conversation/latestCommand';

export default createLatestCommand('iglatest');
