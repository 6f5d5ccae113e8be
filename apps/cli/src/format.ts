import chalk from 'chalk';
import { format } from 'date-fns';
import {
    CareCircleError, Group, JoinRequest, Member, TrialStatus, UserProfile,
    MAX_GROUP_MEMBERS, MAX_LIFETIME_TRANSITIONS
} from '@carecircle/core';

const day = (date: Date) => format(date, 'yyyy-MM-dd HH:mm');

export function formatGroupLine(group: Group): string {
    return `${chalk.bold(group.name.padEnd(24))} ${chalk.cyan(group.inviteCode)}  ${group.memberIds.length}/${MAX_GROUP_MEMBERS}  ${chalk.gray(group.id)}`;
}

export function printGroup(group: Group, members: Member[], trial: TrialStatus) {
    console.log(chalk.bold(`--- ${group.name} ---`));
    console.log(`Invite code:  ${chalk.cyan(group.inviteCode)}`);
    console.log(`Approval:     ${group.requireApproval ? 'required' : 'not required'}`);
    console.log(`Access:       ${formatTrial(trial)}`);
    console.log("");
    members.forEach(m => {
        const role = m.role === 'admin' ? chalk.yellow('admin ') : 'member';
        const access = m.isAccessEnabled ? '' : chalk.red(' (disabled)');
        console.log(`${m.displayName.padEnd(20)} ${role} ${m.permission.padEnd(5)} ${chalk.gray(m.userId)}${access}`);
    });
    console.log("");
}

export function formatTrial(trial: TrialStatus): string {
    if (trial.subscribed) return chalk.green('subscribed');
    if (!trial.valid) return chalk.red(`trial ended ${day(trial.endsAt)}`);
    return chalk.green(`trial, ${trial.daysRemaining} day(s) left`);
}

export function formatRequest(request: JoinRequest): string {
    return `${request.userName.padEnd(20)} requested ${day(request.requestedAt)}  ${chalk.gray(request.id)}`;
}

export function printProfile(profile: UserProfile) {
    console.log(chalk.bold(`--- ${profile.userId} ---`));
    console.log(`Owned group:  ${profile.ownedGroupId ?? 'none'}`);
    console.log(`Can create:   ${profile.canCreateGroup ? chalk.green('yes') : chalk.red('no')}`);
    if (profile.cooldownEndDate) console.log(`Cooldown:     until ${day(profile.cooldownEndDate)}`);
    console.log(`Transitions:  ${profile.transitionCount}/${MAX_LIFETIME_TRANSITIONS}`);
}

export function describeError(e: unknown): string {
    if (e instanceof CareCircleError) return `${e.message} (${e.code})`;
    if (e instanceof Error) return e.message;
    return String(e);
}
