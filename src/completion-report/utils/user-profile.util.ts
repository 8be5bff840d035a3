import dayjs from 'dayjs';
import { MoodleUser } from '../../moodle/interfaces/moodle.interfaces';
import { ReportRow } from '../interfaces/course-report.interface';

export function roleNames(user: MoodleUser): string {
  return (user.roles ?? [])
    .map((r) => r.name ?? String(r.roleid ?? ''))
    .join(', ');
}

// lastaccess viene en segundos (epoch); 0 = nunca
export function lastAccessStr(user: MoodleUser): string {
  return user.lastaccess ? dayjs.unix(user.lastaccess).format('YYYY-MM-DD HH:mm:ss') : '';
}

export function flattenCustomFields(user: MoodleUser): ReportRow {
  const out: ReportRow = {};
  for (const field of user.customfields ?? []) {
    const key = field.shortname || field.name;
    if (!key) continue;
    out[key] = field.value ?? '';
  }
  return out;
}

/**
 * Perfil plano del usuario. Los campos personalizados se mezclan al final y
 * pisan a los estándar si comparten nombre.
 */
export function userProfile(user: MoodleUser): ReportRow {
  return {
    'User ID': user.id,
    'Full Name': user.fullname ?? '',
    Username: user.username ?? '',
    Email: user.email ?? '',
    Department: user.department ?? '',
    Institution: user.institution ?? '',
    City: user.city ?? '',
    Country: user.country ?? '',
    'Last Access': lastAccessStr(user),
    'Role(s)': roleNames(user),
    ...flattenCustomFields(user),
  };
}

// "quiz" + "Final exam" → "Quiz: Final exam"
export function activityColumnName(type: string, name: string): string {
  const label = type ? type.charAt(0).toUpperCase() + type.slice(1).toLowerCase() : '';
  return `${label}: ${name}`;
}
